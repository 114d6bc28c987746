/**
 * Common Schema Definitions
 *
 * Shared column definitions used across the tables.
 */

import { varchar, timestamp } from 'drizzle-orm/pg-core';

/**
 * Typed ID column - 17-character prefixed TSID, e.g. "ugr_0HZXEQ5Y8JY5Z".
 */
export const tsidColumn = (name: string) => varchar(name, { length: 17 });

/**
 * Identifier issued by another system (users, organizations, instances).
 * No format is assumed.
 */
export const externalIdColumn = (name: string) => varchar(name, { length: 200 });

/**
 * Standard timestamp column with timezone.
 */
export const timestampColumn = (name: string) => timestamp(name, { withTimezone: true, mode: 'date' });
