/**
 * Dependency Injection - Service Tokens
 */

export const TYPES = {
  // Core services
  RuntimeConfig: Symbol.for('RuntimeConfig'),
  Logger: Symbol.for('Logger'),
  AgentDriver: Symbol.for('AgentDriver'),
  Relay: Symbol.for('Relay'),

  // Event system
  EventBus: Symbol.for('EventBus'),
};
