/**
 * Type definitions for the growspace registry
 */

import type { GrowspaceConfig } from '$types/config';
import type { Logger } from '@logging';
import type { ProfileTable } from '@core/threshold-profile';
import type { InputEvent, OutputListener } from '@events';
import type { Orchestrator } from '@system/orchestrator';

export interface RegistryDeps {
  logger: Logger;
  profiles?: ProfileTable;
}

export interface Registry {
  /**
   * Create and register an orchestrator
   * @throws {ConfigurationError} On invalid config or a duplicate id
   */
  add(config: GrowspaceConfig): Orchestrator;
  /** Dispose and forget a growspace; false when the id is unknown */
  remove(id: string): boolean;
  /** Route an event by growspaceId; false when it was dropped */
  dispatch(event: InputEvent): boolean;
  /** Advance every growspace */
  tick(now: number): void;
  get(id: string): Orchestrator | undefined;
  ids(): string[];
  /** Listen to every current and future growspace */
  on(listener: OutputListener): () => void;
  /** Dispose every growspace */
  dispose(): void;
}
