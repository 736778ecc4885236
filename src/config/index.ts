// src/config/index.ts

export { loadSettings } from './settings';
export type { CoreSettings, KnowledgeCollection } from './settings';
export { loadTaxonomy, tagNames, routeTopic } from './taxonomy';
export type { Taxonomy, TaxonomyTag } from './taxonomy';
