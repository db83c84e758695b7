export type { Logger } from './application/interfaces/Logger';
export type { MetricsCollector } from './application/interfaces/MetricsCollector';
export { PublishTicksUsecase } from './application/usecases/PublishTicksUsecase';
export {
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_HEARTBEAT_INTERVAL_MS,
  DEFAULT_TICKER_URL,
  resolveTickerOptions,
  type TickerOptions,
} from './config/TickerOptions';
export {
  AuthenticationError,
  ConfigurationError,
  HeartbeatTimeoutError,
  IllegalStateError,
  ProtocolError,
  ReconnectExhaustedError,
  ServerMessageError,
  TickerError,
  TransportError,
} from './domain/errors';
export type { TickerEventKind, TickerEventMap } from './domain/events';
export type { TickPublisher } from './domain/repositories/TickPublisher';
export type * from './domain/types';
export { DEFAULT_SUBSCRIPTION_MODE, SUBSCRIPTION_MODES } from './domain/types';
export { FrameCodec } from './infra/codec/FrameCodec';
export { PriceDivisorTable } from './infra/codec/PriceDivisorTable';
export { PinoLogger } from './infra/logger/PinoLogger';
export { PrometheusMetricsCollector } from './infra/metrics/PrometheusMetricsCollector';
export { StreamRepository } from './infra/redis/StreamRepository';
export type {
  ConnectionRequest,
  WebSocketConnection,
  WebSocketConnectionFactory,
} from './infra/websocket/interfaces/WebSocketConnection';
export { TickerClient } from './presentation/ticker/TickerClient';
