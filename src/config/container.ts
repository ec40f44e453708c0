import "reflect-metadata";
import { Container } from "inversify";
import { TYPES } from "./Types";
import { CONFIG, type AIConfig } from "./config";

/**
 * Dependency injection container configuration.
 *
 * Wires the AI core around the host's world and action factory. Everything
 * is a singleton so one container holds one planner state.
 *
 * Bindings:
 * - Host: WorldQueryService, ActionFactory
 * - Core: AIConfig, RandomSource, EventBus, ActionGatherBus, AISystem
 *
 * @module config
 */
import { EventBus, type EventBusConfig } from "../domain/simulation/ecs/EventBus";
import {
  ActionGatherBus,
  type ActionGatherBusConfig,
} from "../domain/simulation/systems/agents/ai/actions/ActionGatherBus";
import { AISystem } from "../domain/simulation/systems/agents/ai/AISystem";
import type { ActionFactory, WorldQueryService } from "../domain/types/world";
import {
  createRandomSource,
  type RandomSource,
} from "../shared/utils/RandomUtils";

export interface AIContainerOptions {
  /** Merged over the environment-loaded config */
  config?: Partial<AIConfig>;
  /** Replaces the seeded source built from `config.seed` */
  random?: RandomSource;
  eventBus?: Partial<EventBusConfig>;
  gatherBus?: Partial<ActionGatherBusConfig>;
}

export function createAIContainer(
  world: WorldQueryService,
  actions: ActionFactory,
  options: AIContainerOptions = {},
): Container {
  const container = new Container();
  const config: AIConfig = { ...CONFIG, ...options.config };

  container.bind<AIConfig>(TYPES.AIConfig).toConstantValue(config);
  container.bind<WorldQueryService>(TYPES.WorldQueryService).toConstantValue(world);
  container.bind<ActionFactory>(TYPES.ActionFactory).toConstantValue(actions);

  container
    .bind<RandomSource>(TYPES.RandomSource)
    .toDynamicValue(() => options.random ?? createRandomSource(config.seed))
    .inSingletonScope();

  container
    .bind<EventBus>(TYPES.EventBus)
    .toDynamicValue(() => {
      return new EventBus(options.eventBus);
    })
    .inSingletonScope();

  container
    .bind<ActionGatherBus>(TYPES.ActionGatherBus)
    .toDynamicValue(() => {
      return new ActionGatherBus(options.gatherBus);
    })
    .inSingletonScope();

  container.bind<AISystem>(TYPES.AISystem).to(AISystem).inSingletonScope();

  return container;
}
