/**
 * @vidsynth/server: WebSocket control channel and HTTP endpoints around
 * the engine.
 */

export { createSynthServer } from "./synth-server.js";
export type { SynthServer, SynthServerOptions } from "./synth-server.js";
export { createApp } from "./app.js";
export type { AppOptions } from "./app.js";
export { ClientHub } from "./client-hub.js";
export { handleClientMessage, modesListMessage } from "./handlers.js";
export type { HandlerContext, Reply, ServerState } from "./handlers.js";
export { clientMessageSchema, parseClientMessage } from "./protocol.js";
export type { ClientMessage, ParseResult, ServerMessage } from "./protocol.js";
export { parseConfig, DEFAULT_HOST, DEFAULT_MODES_DIR, DEFAULT_PORT } from "./config.js";
export type { ServerConfig } from "./config.js";
