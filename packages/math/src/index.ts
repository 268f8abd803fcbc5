/**
 * feescope Math public surface. Pure, side-effect free fee aggregation.
 * Export only stable functions via this barrel for tree-shaking.
 */
export * from './fee'
export * from './chunks'
