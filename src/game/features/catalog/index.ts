/**
 * Construction Catalog Feature Module
 *
 * Public API:
 * - Types: ItemDefinition, ItemCategory, Footprint, ResourceCost
 * - ConstructionCatalog: immutable lookup with UnknownItem results
 * - Loader: parseItemDefinitions, loadDefaultItemDefinitions
 */

export type { ItemDefinition, ItemCategory, Footprint, ResourceCost } from './types';
export { ITEM_CATEGORIES, isItemCategory } from './types';
export { ConstructionCatalog, FALLBACK_ITEM_ID } from './construction-catalog';
export { parseItemDefinitions, loadDefaultItemDefinitions } from './loader';
