export { handleCLI } from "./cli";
export {
  runFileServer,
  type RunOptions,
  type RunningFileServer,
  type SignalSource,
} from "./run";
export { APP_NAME, APP_VERSION } from "./app-info";
