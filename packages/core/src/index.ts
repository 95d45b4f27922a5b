// Main entry point
export { SubmissionPipeline } from './SubmissionPipeline.js';
export type { SubmissionPipelineConfig, RunOptions } from './SubmissionPipeline.js';

// Domain model
export type { RawInput, Draft } from './domain/model/Draft.js';
export { isEmptyValue } from './domain/model/Draft.js';
export type { FormSchema } from './domain/model/FormSchema.js';
export type {
  FieldDefinition,
  FieldType,
  FieldRule,
  RuleContext,
  ValidationFieldResult,
} from './domain/model/FieldDefinition.js';
export type { ValidationResult, ValidationError, BuiltInRule } from './domain/model/ValidationResult.js';
export { errorsByField } from './domain/model/ValidationResult.js';
export { ValidDraft } from './domain/model/ValidDraft.js';
export { CanonicalRequest } from './domain/model/CanonicalRequest.js';
export type {
  Outcome,
  Success,
  Failure,
  FailureOf,
  FailureDetails,
  ErrorKind,
  TransportReason,
} from './domain/model/Outcome.js';
export { success, failure, isSuccess, isFailure, isFailureOf, describeFailure } from './domain/model/Outcome.js';
export type { HttpMethod, HttpRequest, HttpResponse } from './domain/model/HttpExchange.js';
export { isSuccessStatus, readText, readJson, jsonResponse, textResponse } from './domain/model/HttpExchange.js';
export { SubmissionStatus, isTerminal } from './domain/model/SubmissionStatus.js';
export { TransportError, isTransportError } from './domain/errors/TransportError.js';
export type { TransportErrorReason } from './domain/errors/TransportError.js';

// Domain services (the four stages and their helpers)
export { InputCollector } from './domain/services/InputCollector.js';
export { SchemaValidator } from './domain/services/SchemaValidator.js';
export { matchesField, oneOf, satisfies } from './domain/services/FieldRules.js';
export { DraftTransformer } from './domain/services/DraftTransformer.js';
export type { DraftTransformerConfig, TransformedFields } from './domain/services/DraftTransformer.js';
export { HttpSubmitter } from './domain/services/HttpSubmitter.js';
export type { HttpSubmitterConfig } from './domain/services/HttpSubmitter.js';
export { RetryingSubmitter } from './domain/services/RetryingSubmitter.js';
export type { RetryOptions } from './domain/services/RetryingSubmitter.js';

// Application internals (for extension packages)
export { EventBus } from './application/EventBus.js';
export type { HandlerErrorCallback } from './application/EventBus.js';

// Ports (for custom implementations)
export type { DraftValidator } from './domain/ports/DraftValidator.js';
export type { RequestTransformer } from './domain/ports/RequestTransformer.js';
export type { RequestSubmitter, SubmitOptions } from './domain/ports/RequestSubmitter.js';
export type { HttpClient } from './domain/ports/HttpClient.js';
export type { SecretHasher, HashPolicy } from './domain/ports/SecretHasher.js';
export type { ResponseMapper, MappedResponse } from './domain/ports/ResponseMapper.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  SubmissionStartedEvent,
  SubmissionInvalidEvent,
  SubmissionTransformedEvent,
  SubmissionSubmittingEvent,
  SubmissionSucceededEvent,
  SubmissionFailedEvent,
  SubmissionCancelledEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters (built-in)
export { FetchHttpClient } from './infrastructure/http/FetchHttpClient.js';
export type { FetchHttpClientOptions } from './infrastructure/http/FetchHttpClient.js';
export { InMemoryHttpClient } from './infrastructure/http/InMemoryHttpClient.js';
export type { RouteHandler } from './infrastructure/http/InMemoryHttpClient.js';
export { JsonResponseMapper } from './infrastructure/http/JsonResponseMapper.js';
export { Sha256SecretHasher } from './infrastructure/hashing/Sha256SecretHasher.js';
export type { Sha256SecretHasherOptions } from './infrastructure/hashing/Sha256SecretHasher.js';
export { ScryptSecretHasher } from './infrastructure/hashing/ScryptSecretHasher.js';
export type { ScryptSecretHasherOptions } from './infrastructure/hashing/ScryptSecretHasher.js';
