import type { Logger } from 'pino';
import type { CleaningConfig } from '../domain/model/CleaningConfig.js';
import type { FieldSpec } from '../domain/model/FieldSpec.js';
import type { TableCodec } from '../domain/ports/TableCodec.js';
import { FieldAliasResolver } from '../domain/services/FieldAliasResolver.js';
import { DateNormalizer } from '../domain/services/DateNormalizer.js';
import { CleaningPolicyEngine } from '../domain/services/CleaningPolicyEngine.js';
import type { EventBus } from './EventBus.js';

/**
 * Collaborators shared by the cleaning use cases of one `DateCleaner`.
 *
 * Everything here is immutable; `restrictTo` builds a sibling context that
 * shares the configuration, registry and event bus.
 */
export class CleaningContext {
  readonly resolver: FieldAliasResolver;
  readonly normalizer: DateNormalizer;
  readonly policy: CleaningPolicyEngine;

  constructor(
    readonly config: CleaningConfig,
    readonly fields: readonly FieldSpec[],
    readonly codec: TableCodec,
    readonly eventBus: EventBus,
    readonly logger: Logger,
    readonly maxConcurrentFiles: number,
  ) {
    this.resolver = new FieldAliasResolver();
    this.normalizer = new DateNormalizer({
      registry: config.registry,
      outputFormat: config.outputFormat,
      outputFormatDateOnly: config.outputFormatDateOnly,
      stripTrailingDecimalZero: config.options.stripTrailingDecimalZero,
    });
    this.policy = new CleaningPolicyEngine(config.options.onParseFailure);
  }

  /** Context limited to the configured fields whose canonical name is in `names`. Unknown names are ignored. */
  restrictTo(names: readonly string[]): CleaningContext {
    const wanted = new Set(names);
    return new CleaningContext(
      this.config,
      this.fields.filter((field) => wanted.has(field.name)),
      this.codec,
      this.eventBus,
      this.logger,
      this.maxConcurrentFiles,
    );
  }
}
