export { MessageProcessor, MessageProcessorBuilder } from './processor.js';
export type { MessageAggregator, MessageFilter, MessageTransformer } from './types.js';
export { outputTypeName, toolOutputFilter, typeFilter, type OutputTypeName } from './filters.js';
export { ansiStripper, lineTruncator, truncateLines } from './transformers.js';
export { AGGREGATED_TURN_ID, createDeltaAggregator, createDuplicateRemover } from './aggregators.js';
export { mapMessageText } from './text.js';
export { pipeOutput } from './pipe.js';
