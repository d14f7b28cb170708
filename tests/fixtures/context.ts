import type { Logger } from 'pino';
import type { CleaningConfig } from '../../src/domain/model/CleaningConfig.js';
import type { TableCodec } from '../../src/domain/ports/TableCodec.js';
import { CleaningContext } from '../../src/application/CleaningContext.js';
import { EventBus } from '../../src/application/EventBus.js';
import { CsvTableCodec } from '../../src/infrastructure/codecs/CsvTableCodec.js';
import { createLogger } from '../../src/infrastructure/logging/logger.js';

export interface TestContextOptions {
  readonly codec?: TableCodec;
  readonly logger?: Logger;
  readonly maxConcurrentFiles?: number;
}

export function createTestContext(config: CleaningConfig, options?: TestContextOptions): CleaningContext {
  const logger = options?.logger ?? createLogger('test');
  return new CleaningContext(
    config,
    config.dateFields,
    options?.codec ?? new CsvTableCodec(),
    new EventBus(logger),
    logger,
    options?.maxConcurrentFiles ?? 1,
  );
}
