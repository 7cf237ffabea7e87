import { registerDialect } from '@sqlweave/core';

import { PostgreSQLDialect } from './dialect/postgresql-dialect';

// Auto-register PostgreSQL dialect
registerDialect('postgresql', () => new PostgreSQLDialect());
registerDialect('postgres', () => new PostgreSQLDialect());

export { PostgreSQLDialect };
