/**
 * Growspace registry
 *
 * Keeps one orchestrator per growspace and routes input events by id.
 * Growspaces share nothing but the logger.
 */

import { ConfigurationError } from '$types/errors';
import { createOrchestrator } from '@system/orchestrator';

import type { GrowspaceConfig } from '$types/config';
import type { InputEvent, OutputEvent, OutputListener } from '@events';
import type { Orchestrator } from '@system/orchestrator';
import type { Registry, RegistryDeps } from './types';

/**
 * Create an empty registry
 *
 * @param deps - Logger and optional profile table passed to every orchestrator
 * @returns Registry handle
 *
 * @example
 * ```typescript
 * const registry = createRegistry({ logger });
 * registry.add(createGrowspaceConfig('tent-a'));
 * registry.dispatch({ type: 'light_change', growspaceId: 'tent-a', on: true, timestamp: now() });
 * ```
 */
export function createRegistry(deps: RegistryDeps): Registry {
  const logger = deps.logger;
  const orchestrators = new Map<string, Orchestrator>();
  let listeners: OutputListener[] = [];

  /**
   * Forward one growspace's output to every registry listener
   * @param event - Output event
   */
  function fanOut(event: OutputEvent): void {
    const current = listeners.slice();
    for (let i = 0; i < current.length; i++) {
      try {
        current[i](event);
      } catch (err) {
        logger.warning('[' + event.growspaceId + '] listener error: ' + String(err));
      }
    }
  }

  function add(config: GrowspaceConfig): Orchestrator {
    if (orchestrators.has(config.id)) {
      throw new ConfigurationError('registry: growspace already registered (got ' + config.id + ')');
    }

    const orchestrator = createOrchestrator(config, { logger: logger, profiles: deps.profiles });
    orchestrator.on(fanOut);
    orchestrators.set(config.id, orchestrator);
    logger.info('Growspace ' + config.id + ' registered');
    return orchestrator;
  }

  function remove(id: string): boolean {
    const orchestrator = orchestrators.get(id);
    if (!orchestrator) {
      return false;
    }
    orchestrator.dispose();
    orchestrators.delete(id);
    logger.info('Growspace ' + id + ' removed');
    return true;
  }

  function dispatch(event: InputEvent): boolean {
    const orchestrator = orchestrators.get(event.growspaceId);
    if (!orchestrator) {
      logger.warning('Dropping ' + event.type + ' for unknown growspace ' + event.growspaceId);
      return false;
    }

    switch (event.type) {
      case 'sensor_update':
        orchestrator.handleSensorUpdate({ variable: event.variable, value: event.value, timestamp: event.timestamp });
        break;
      case 'stage_change':
        orchestrator.handleStageChange({ stage: event.stage, stageStart: event.stageStart, timestamp: event.timestamp });
        break;
      case 'light_change':
        orchestrator.handleLightChange({ on: event.on, timestamp: event.timestamp });
        break;
    }
    return true;
  }

  function tick(now: number): void {
    orchestrators.forEach(function(orchestrator) {
      orchestrator.tick(now);
    });
  }

  function on(listener: OutputListener): () => void {
    listeners.push(listener);
    return function unsubscribe() {
      listeners = listeners.filter((l) => l !== listener);
    };
  }

  function dispose(): void {
    orchestrators.forEach(function(orchestrator) {
      orchestrator.dispose();
    });
    orchestrators.clear();
    listeners = [];
  }

  return {
    add: add,
    remove: remove,
    dispatch: dispatch,
    tick: tick,
    get: (id) => orchestrators.get(id),
    ids: () => Array.from(orchestrators.keys()),
    on: on,
    dispose: dispose
  };
}
