import { setTimeout as delay } from 'timers/promises';
import { Container, createToken } from '../core/di/container';
import type { ServiceConfig } from '../config/service-config';
import { SeededRandom, WeightedSelector } from '../outcomes/outcome-selector';
import { loadOutcomeTable, validateOutcomeTable } from '../outcomes/outcome-table';
import type { OutcomeTable, RandomSource } from '../outcomes/types';
import { LeakStore } from '../service/leak-store';
import type { Clock, ServiceContext, Sleep } from '../service/types';

export const tokens = {
  config: createToken<ServiceConfig>('config'),
  outcomeTable: createToken<OutcomeTable>('outcomeTable'),
  random: createToken<RandomSource>('random'),
  selector: createToken<WeightedSelector>('selector'),
  sleep: createToken<Sleep>('sleep'),
  clock: createToken<Clock>('clock'),
  leakStore: createToken<LeakStore>('leakStore'),
  serviceContext: createToken<ServiceContext>('serviceContext')
};

export interface BuildContainerOptions {
  /** Replaces the seeded or ambient random source. */
  random?: RandomSource;
  sleep?: Sleep;
  clock?: Clock;
  outcomeTable?: OutcomeTable;
}

/**
 * Wires the service context. The outcome table is validated here, so an
 * invalid table fails the build instead of a request.
 */
export function buildContainer(config: ServiceConfig, options: BuildContainerOptions = {}): Container {
  const container = new Container();

  container.registerValue(tokens.config, config);
  container.registerValue(tokens.outcomeTable, options.outcomeTable
    ? validateOutcomeTable(options.outcomeTable)
    : loadOutcomeTable(config.outcomeTablePath));

  container.register(tokens.random, () => {
    if (options.random) {
      return options.random;
    }
    if (config.randomSeed !== undefined) {
      return new SeededRandom(config.randomSeed).asSource();
    }
    return Math.random;
  }, { singleton: true });

  container.register(tokens.selector, (c) => new WeightedSelector(c.resolve(tokens.random)), { singleton: true });
  container.register(tokens.sleep, () => options.sleep ?? ((ms: number) => delay(ms).then(() => undefined)), { singleton: true });
  container.register(tokens.clock, () => options.clock ?? Date.now, { singleton: true });
  container.register(tokens.leakStore, (c) => new LeakStore(c.resolve(tokens.config).leak.chunkBytes), { singleton: true });

  container.register(tokens.serviceContext, (c) => {
    let requestCount = 0;
    return {
      config: c.resolve(tokens.config),
      outcomeTable: c.resolve(tokens.outcomeTable),
      selector: c.resolve(tokens.selector),
      sleep: c.resolve(tokens.sleep),
      now: c.resolve(tokens.clock),
      leakStore: c.resolve(tokens.leakStore),
      nextRequestId: () => {
        requestCount += 1;
        return requestCount;
      }
    };
  }, { singleton: true });

  return container;
}
