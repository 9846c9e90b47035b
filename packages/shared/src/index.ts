export * from './types/user.types.js';
export * from './types/friendship.types.js';
export * from './types/note.types.js';
export * from './types/api.types.js';
export * from './constants/limits.js';
export * from './constants/profile.js';
export { buildContentPreview } from './utils/preview.js';
