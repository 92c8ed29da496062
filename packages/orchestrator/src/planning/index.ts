export { PlanResolver, deterministicPlan, repairProposal, ruleFor, buildPlan } from './resolver.js';
export type { PlanProposer, ProposedPlan, PlanResolverOptions } from './resolver.js';
export { AdapterPlanProposer, buildPlanningPrompt } from './adapter-proposer.js';
export type { AdapterPlanProposerOptions } from './adapter-proposer.js';
export { detectIntent, isBuildConfirmation, matchesAny } from './intent.js';
export type { IntentSignals } from './intent.js';
export {
  RequestTranslator,
  heuristicTranslation,
  clampDays,
  buildTranslationPrompt,
  DEFAULT_OBJECTIVE,
  DEFAULT_DAYS,
} from './translator.js';
export type { RequestTranslatorOptions, TranslateOptions, Translation } from './translator.js';
export { extractJsonObject } from './json.js';
