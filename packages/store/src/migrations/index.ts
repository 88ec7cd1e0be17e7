import type { Migration } from '../migrations.js';
import { migration001 } from './001-graph-schema.js';
import { migration002 } from './002-trace-schema.js';

export const allMigrations: Migration[] = [migration001, migration002];
