export { VisibilityState, IdentitySource } from './enums.js';
export type { ScrollPosition, ViewportSize } from './structures.js';
