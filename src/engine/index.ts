export { LearningEngine, type EngineDeps } from "./engine.js";
export { TextAnalyzer, type AnalyzerOptions, type TopicExtraction } from "./analyzer.js";
export {
  PatternTracker,
  dominantToneOf,
  localTime,
  modeOf,
  sentimentTrend,
  styleScoresOf,
  type PatternTrackerOptions,
} from "./patterns.js";
export { FactSynthesizer, interestValue, periodOfDay, slugify } from "./synthesizer.js";
export { FactMerger, applyUpserts, type FactMergerOptions } from "./merger.js";
export { generateInsights } from "./insights.js";
export { confidenceFor, factKey, DEFAULT_THRESHOLDS } from "./confidence.js";
export {
  buildLexicon,
  loadDefaultLexicon,
  type Lexicon,
  type LexiconData,
  type PreferenceMarkerDef,
} from "./lexicon.js";
export {
  builtinIntentRules,
  classifyIntent,
  findPreferenceMarker,
  preferenceStance,
  type IntentContext,
  type IntentRule,
  type PreferenceMarker,
  type PreferenceStance,
} from "./intent-rules.js";
export { tokenize } from "./tokenize.js";
export { LearnloopError, InvalidInputError, InsufficientDataError, ConfigurationError } from "./errors.js";
export * from "./types.js";
