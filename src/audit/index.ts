export { AuditLogService, formatBucketKey } from './audit-log-service.js';
export * from './types.js';
