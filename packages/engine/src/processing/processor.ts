import type { OutputMessage } from '../types/index.js';
import { createDeltaAggregator, createDuplicateRemover } from './aggregators.js';
import { toolOutputFilter, typeFilter, type OutputTypeName } from './filters.js';
import { ansiStripper, lineTruncator } from './transformers.js';
import type { MessageAggregator, MessageFilter, MessageTransformer } from './types.js';

/**
 * Post-processing chain over output messages: filters first (any veto drops
 * the message), then transformers in registration order, then aggregators,
 * each receiving what the previous one passed on.
 */
export class MessageProcessor {
  private readonly filters: ReadonlyArray<MessageFilter>;
  private readonly transformers: ReadonlyArray<MessageTransformer>;
  private readonly aggregators: ReadonlyArray<MessageAggregator>;

  constructor(
    filters: ReadonlyArray<MessageFilter>,
    transformers: ReadonlyArray<MessageTransformer>,
    aggregators: ReadonlyArray<MessageAggregator>,
  ) {
    this.filters = filters;
    this.transformers = transformers;
    this.aggregators = aggregators;
  }

  static builder(): MessageProcessorBuilder {
    return new MessageProcessorBuilder();
  }

  process(message: OutputMessage): OutputMessage[] {
    if (!this.filters.every((filter) => filter.shouldKeep(message))) {
      return [];
    }

    let current: OutputMessage | null = this.transformers.reduce(
      (transformed, transformer) => transformer.transform(transformed),
      message,
    );

    for (const aggregator of this.aggregators) {
      if (current === null) {
        break;
      }
      current = aggregator.process(current);
    }

    return current === null ? [] : [current];
  }

  /** Call once, after the last message. */
  flush(): OutputMessage[] {
    return this.aggregators.flatMap((aggregator) => aggregator.flush());
  }
}

export class MessageProcessorBuilder {
  private readonly filters: MessageFilter[] = [];
  private readonly transformers: MessageTransformer[] = [];
  private readonly aggregators: MessageAggregator[] = [];

  filter(filter: MessageFilter): this {
    this.filters.push(filter);
    return this;
  }

  transform(transformer: MessageTransformer): this {
    this.transformers.push(transformer);
    return this;
  }

  aggregate(aggregator: MessageAggregator): this {
    this.aggregators.push(aggregator);
    return this;
  }

  filterToolOutput(): this {
    return this.filter(toolOutputFilter);
  }

  filterByType(types: Iterable<OutputTypeName>): this {
    return this.filter(typeFilter(types));
  }

  stripAnsiCodes(): this {
    return this.transform(ansiStripper);
  }

  truncateLines(maxLength: number): this {
    return this.transform(lineTruncator(maxLength));
  }

  aggregateDeltas(): this {
    return this.aggregate(createDeltaAggregator());
  }

  removeDuplicates(): this {
    return this.aggregate(createDuplicateRemover());
  }

  build(): MessageProcessor {
    return new MessageProcessor([...this.filters], [...this.transformers], [...this.aggregators]);
  }
}
