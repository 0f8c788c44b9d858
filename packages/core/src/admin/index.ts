export { DrizzleAdminRepository, likePattern, type AdminRepository } from './admin-repository.js';
export { AdminService, periodStart, RECENT_TRANSFERS_LIMIT, TREND_DAYS } from './admin-service.js';
export * from './admin-types.js';
export * from './admin-errors.js';
