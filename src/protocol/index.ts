/**
 * Protocol layer exports for BGAPI framing and dispatch.
 */

export * from './constants';
export * from './bytes';
export * from './fields';
export * from './header';
export * from './message';
export * from './validator';
export * from './dispatch';
export * from './commands';
export * from './responses';
export * from './events';
