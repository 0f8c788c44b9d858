/**
 * Profiles Domain
 */

export { DrizzleProfileRepository } from './profile-repository.js';
export type { ProfileRepository } from './profile-repository.js';

export { ProfileService } from './profile-service.js';
export type { ProfileResponse, UpdateProfileData } from './profile-types.js';

export { InvalidProfileDataError, ProfileNotFoundError } from './profile-errors.js';
