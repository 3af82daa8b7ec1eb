export { ZeroShotClient, kDefaultInferenceEndpoint } from "./ZeroShotClient.js";
export type { ZeroShotClientConfig } from "./ZeroShotClient.js";
