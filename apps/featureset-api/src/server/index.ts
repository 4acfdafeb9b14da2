export { type BuiltServer, buildServer } from "./build-server"
export { run } from "./run"
