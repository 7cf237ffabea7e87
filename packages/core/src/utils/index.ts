export { isCount, isList, isOrderedMap, isPlainObject, isStringList } from './guards';
export { createConsoleLogger, truncateSql } from './logger';
