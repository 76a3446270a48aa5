export { HttpBridgeTransport, BridgeRequestError, type HttpBridgeTransportOptions } from "./client.js";
