/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export { loadTaxonomy, loadTaxonomyWithFallback } from "./loadTaxonomy.js";
export { loadRules, loadRulesWithFallback } from "./loadRules.js";
export {
    loadSettings,
    kDefaultTaxonomyPath,
    kDefaultRulesPath,
} from "./settings.js";
export type { Settings } from "./settings.js";
