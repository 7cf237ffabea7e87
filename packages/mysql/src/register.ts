import { registerDialect } from '@sqlweave/core';

import { MySQLDialect } from './dialect/mysql-dialect';

// Auto-register MySQL dialect
registerDialect('mysql', () => new MySQLDialect());
registerDialect('mariadb', () => new MySQLDialect());

export { MySQLDialect };
