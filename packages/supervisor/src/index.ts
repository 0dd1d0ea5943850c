/**
 * @hostwarden/supervisor — process fleet supervision.
 *
 * ProcessHandle owns one OS process, ManagedServer runs one server's
 * lifecycle, Supervisor drives the whole fleet and feeds the EventBus.
 */

export * from './event-bus.js';
export * from './lock.js';
export * from './restart-window.js';
export * from './actions.js';
export * from './health.js';
export * from './process-handle.js';
export * from './managed-server.js';
export * from './supervisor.js';
