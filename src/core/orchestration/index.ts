export { FetchOrchestrator } from './FetchOrchestrator.ts';
export type {
  EndpointFailure,
  EndpointOutcome,
  EndpointSuccess,
  OrchestrationOptions,
  OrchestrationReport,
} from './types.ts';
