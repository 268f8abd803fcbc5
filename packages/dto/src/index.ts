/**
 * feescope DTO package public surface.
 * Re-exports stable enums, fee value types and reason codes. Only items exported here are published.
 */
export * from './enums';
export * from './fees';
export * from './reasons';
