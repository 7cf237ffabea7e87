export * from './types';
export * from './constants';
export * from './errors';
export * from './utils';
export * from './dialect';
export * from './query';
export * from './schema';

export { ParameterBinder } from './params/parameter-binder';

export { QueryBuilder } from './query-builder';
export type {
  QueryBuilderOptions,
  QueryBuilderEvents,
  BuildEvent,
  BuildErrorEvent,
  StatementKind,
} from './query-builder';
