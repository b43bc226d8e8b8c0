/**
 * Event system
 * Dispatching and handling of committed lifecycle events
 */

// Event dispatcher implementation
export { EventDispatcherImpl } from './event-dispatcher.impl';

// Built-in event handlers
export { LoggingEventHandler } from './handlers/logging.handler';
