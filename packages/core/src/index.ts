export { Architect, runReview, withArchitect } from './architect';
export * from './types';
export * from './logger';
export * from './config/configSource';
export * from './config/providerConfig';
export * from './errors/errors';
export * from './errors/errorTranslator';
export * from './extract/responseExtractor';
export * from './critique/classifier';
export * from './critique/render';
export * from './prompts/inputKind';
export * from './prompts/prompts';
export * from './transport/httpTransport';
export * from './providers/types';
export * from './providers/ollamaProvider';
export * from './providers/openRouterProvider';
export * from './providers/registry';
