export {
  History,
  type HistoryEntry,
  type HistoryFind,
  type HistoryRead,
  type Tick,
} from "./history/History.js";
export type { Authoritative, ServerDriven, Simulation } from "./rollback/Authoritative.js";
export {
  applyCatchUp,
  bufferedAhead,
  type CatchUpResult,
  type CatchUpSettings,
  validateCatchUpSettings,
} from "./rollback/CatchUpPolicy.js";
export { NetworkedScene, type RollbackTarget } from "./rollback/NetworkedScene.js";
export {
  PredictedController,
  type PredictedControllerOptions,
  type Transmit,
} from "./rollback/PredictedController.js";
export {
  type AuthorityStep,
  ReconciliationEngine,
  type ReconcileOutcome,
  type SubmitOutcome,
} from "./rollback/ReconciliationEngine.js";
export {
  type ControllerRole,
  type ControllerSettings,
  DEFAULT_CONTROLLER_SETTINGS,
  RollbackController,
} from "./rollback/RollbackController.js";
export { createRollbackStats, type RollbackStats } from "./rollback/RollbackStats.js";
export {
  type ConnectionTransmit,
  ServerDrivenController,
  type ServerDrivenControllerOptions,
} from "./rollback/ServerDrivenController.js";
export { type TickPhases, TickDriver } from "./core/TickDriver.js";
export { RollbackClient, type RollbackClientOptions } from "./client/RollbackClient.js";
export {
  type PredictedCodecs,
  RollbackServer,
  type RollbackServerOptions,
} from "./server/RollbackServer.js";
export {
  decodePairPayload,
  decodePayload,
  encodePairPayload,
  encodePayload,
  type PayloadCodec,
  PayloadOverflowError,
  PayloadReader,
  PayloadUnderflowError,
  PayloadWriter,
} from "./shared/payloadCodec.js";
export type {
  ClientMessage,
  ReconcileMessage,
  ServerMessage,
  SubmitMessage,
} from "./shared/protocol.js";
export { initNetLog, installCrashHandlers, netLog, netLogError } from "./shared/netLog.js";
export { LocalTransport } from "./transport/LocalTransport.js";
export {
  NetEmulatedClientTransport,
  type NetEmulationConfig,
} from "./transport/NetEmulatedClientTransport.js";
export type { IClientTransport, IServerTransport } from "./transport/Transport.js";
export { CVar } from "./console/CVar.js";
export { CVarRegistry } from "./console/CVarRegistry.js";
export { registerServerCVars, type ServerCVars } from "./console/serverCVarDefs.js";
export { bindNetEmulation, type ClientCVars, registerClientCVars } from "./console/clientCVars.js";
