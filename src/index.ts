export * from "./decision/index.js";
export { UserStore, loadUserStore, parseUserCsv, type ParsedUsers } from "./data/user-store.js";
export { build, type BuildOptions } from "./server.js";
