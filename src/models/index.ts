/**
 * Models layer exports for adapter and peer data.
 */

export * from './adapter-info';
export * from './address';
