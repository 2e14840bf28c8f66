export { pool, connectDatabase, withTransaction, closeDatabase, isUniqueViolation } from './connection';
export { migrate, rollback } from './migrate';
