/**
 * Dependency Injection - Container Configuration
 */

import 'reflect-metadata';
import { Container } from 'inversify';
import { loadAgentDriver } from '../agents/driver-loader.js';
import { Relay } from '../app/relay.js';
import { EventBus } from '../kernel/event-bus.js';
import { createLogger, type RelayLogger } from '../kernel/logger.js';
import type { AgentDriver, RuntimeConfig } from '../kernel/contracts.js';
import { TYPES } from './types.js';

export interface RelayContainerOptions {
  config: RuntimeConfig;
  logger?: RelayLogger;
  /** Pre-built driver; skips loading `config.agent.driver`. */
  driver?: AgentDriver;
}

/**
 * Build a container holding the relay and its collaborators.
 * The driver is resolved eagerly so a bad driver path fails startup.
 */
export async function createRelayContainer(options: RelayContainerOptions): Promise<Container> {
  const { config } = options;
  // Create the container with singleton scope by default
  const container = new Container({ defaultScope: 'Singleton' });

  container.bind<RuntimeConfig>(TYPES.RuntimeConfig).toConstantValue(config);
  container
    .bind<RelayLogger>(TYPES.Logger)
    .toConstantValue(options.logger ?? createLogger(config.logging.level));

  // EventBus should be bound first as other services may depend on it
  container
    .bind<EventBus>(TYPES.EventBus)
    .toDynamicValue(() => new EventBus())
    .inSingletonScope();

  const logger = container.get<RelayLogger>(TYPES.Logger);
  const driver = options.driver ?? await loadAgentDriver(config.agent.driver, {
    options: config.agent.options,
    logger: logger.child({ component: 'agent-driver' }),
  });
  container.bind<AgentDriver>(TYPES.AgentDriver).toConstantValue(driver);

  container
    .bind<Relay>(TYPES.Relay)
    .toDynamicValue((context) => new Relay({
      config: context.container.get<RuntimeConfig>(TYPES.RuntimeConfig),
      logger: context.container.get<RelayLogger>(TYPES.Logger),
      events: context.container.get<EventBus>(TYPES.EventBus),
      driver: context.container.get<AgentDriver>(TYPES.AgentDriver),
    }))
    .inSingletonScope();

  return container;
}

// Re-export types
export { TYPES };
