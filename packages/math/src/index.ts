/**
 * Math public surface. Pure, side-effect free fixed-point helpers.
 * Export only stable functions via this barrel.
 */
export * from './errors'
export * from './fixedPoint'
export * from './format'
