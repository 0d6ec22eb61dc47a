// src/ranking/index.ts
// Public entrypoints for persona-aware ranking and answer synthesis.

export type { PersonaCategory, PersonaProfile, PersonaResolution, PersonaTable } from './personas';
export { DEFAULT_PERSONA_TABLE, parsePersonaTable, resolvePersona } from './personas';

export type { Tokenizer } from './tokenize';
export { defaultTokenizer } from './tokenize';

export { SectionIndex } from './section-index';

export type { QueryVector, RankedSection, RankingQuery, RankingResult } from './ranker';
export { buildQueryVector, rankSections } from './ranker';

export type { SubsectionAnswer, SynthesisResult } from './synthesizer';
export { ANSWER_PARTS, composeAnswer, synthesizeAnswers } from './synthesizer';
