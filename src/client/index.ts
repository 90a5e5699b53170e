export { BridgeClient } from "./client";
export type { ClientOptions, ClientOption } from "./options";
