// @conduit/backend: reasoning backend contract and transports

export * from './types/index.js';
export { abortable, sleep } from './utils/abort.js';
export { calculateBackoff, retry, type RetryOptions } from './utils/retry.js';
export { createSSEStream, type SSEEvent } from './utils/sse.js';
export { decodeWireEvent } from './remote/wire.js';
export { createRemoteBackendConnector, type RemoteBackendOptions } from './remote/remote-backend.js';
export {
  createScriptedBackend,
  scriptedConnector,
  type ScriptedBackend,
  type ScriptedBackendOptions,
  type ScriptedResponder,
} from './scripted/scripted-backend.js';
