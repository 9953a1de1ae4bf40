/**
 * Elastic supply DTO package public surface.
 * Re-exports stable enums and reason codes shared by every package.
 */
export * from './enums';
export * from './reasons';
