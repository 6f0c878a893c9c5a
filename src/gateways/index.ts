export type { ILookupGateway } from './ILookupGateway.js';
export type { IAssessmentGateway } from './IAssessmentGateway.js';
export { IpApiLookupGateway } from './IpApiLookupGateway.js';
export { CensysLookupGateway } from './CensysLookupGateway.js';
export { OpenAIAssessmentGateway } from './OpenAIAssessmentGateway.js';
export { TextAccumulator } from './TextAccumulator.js';
