export type { DiagnosticSink, DispatchDiagnostic } from './application/interfaces/DiagnosticSink';
export type { Logger } from './application/interfaces/Logger';
export type { MetricsCollector } from './application/interfaces/MetricsCollector';
export type { TypeRegistry } from './application/interfaces/TypeRegistry';
export { ERROR_TYPE, type ErrorCall, resolveErrorCall } from './application/receiver/ErrorDispatchAdapter';
export { buildEntryPoints, zipFields } from './application/receiver/entryPoints';
export { messageKey } from './application/receiver/messageKey';
export { Receiver, type ReceiverDependencies } from './application/receiver/Receiver';
export { loadReceiverConfig, type ReceiverConfig } from './config/ReceiverConfig';
export { type CreateReceiverOptions, createReceiver } from './createReceiver';
export { MessageConstructionError } from './domain/errors';
export { createMessageValue, defineMessageType } from './domain/MessageValue';
export type {
  EntryPoint,
  FieldMapping,
  FieldShape,
  Listener,
  MessageType,
  MessageTypeIdentity,
  MessageTypeRef,
  MessageValue,
} from './domain/types';
export { loadCatalog, loadDefaultCatalog } from './infra/catalog/loadCatalog';
export { LoggerDiagnosticSink } from './infra/diagnostics/LoggerDiagnosticSink';
export { LoggerFactory } from './infra/logger/LoggerFactory';
export { PinoLogger } from './infra/logger/PinoLogger';
export { PrometheusMetricsCollector } from './infra/metrics/PrometheusMetricsCollector';
export { StaticTypeRegistry } from './infra/registry/StaticTypeRegistry';
