export { httpWorkload, type HttpWorkloadOptions } from './http.js';
export {
  connectWebSocket,
  socketWorkload,
  type SocketConnection,
  type SocketConnector,
  type SocketWorkloadOptions,
} from './socket.js';
export { sessionWorkload, type SessionStep, type SessionWorkloadOptions } from './session.js';
export { defineWorkload, type CustomWorkloadOptions } from './custom.js';
