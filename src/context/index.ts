export { ContextAnalysisEngine, type ContextEngineOptions } from './engine.js'
export { classify } from './classifier.js'
export {
  commonTopics,
  createAggregate,
  engagementLevel,
  foldMessage,
  replayHistory,
  sentimentTrend,
  snapshotOf,
} from './aggregator.js'
export { buildLexicon, emptyLexicon, getLexicon, loadLexicon, type Lexicon } from './lexicon.js'
export { DEFAULT_ANALYSIS_SETTINGS } from './constants.js'
export * from './types.js'
