/**
 * Loads item definitions from YAML.
 */

import { parse as parseYaml } from 'yaml';
import { ITEM_CATEGORIES, isItemCategory, type ItemDefinition, type ResourceCost, type Footprint } from './types';

// Import YAML as raw text (Vite handles this)
import itemsYaml from './data/items.yaml?raw';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseCost(itemId: string, field: string, raw: unknown): ResourceCost {
    if (raw === undefined || raw === null) return Object.freeze({});
    if (!isRecord(raw)) {
        throw new Error(`Item "${itemId}": ${field} must be a map of resource -> amount`);
    }

    const cost: Record<string, number> = {};
    for (const [resourceId, amount] of Object.entries(raw)) {
        if (typeof amount !== 'number' || !Number.isInteger(amount) || amount < 0) {
            throw new Error(`Item "${itemId}": ${field}.${resourceId} must be a non-negative integer, got ${String(amount)}`);
        }
        if (amount > 0) {
            cost[resourceId] = amount;
        }
    }
    return Object.freeze(cost);
}

function parseFootprint(itemId: string, raw: unknown): Footprint {
    if (raw === undefined) return Object.freeze({ width: 1, depth: 1 });
    if (!isRecord(raw)) {
        throw new Error(`Item "${itemId}": footprint must be { width, depth }`);
    }
    const { width, depth } = raw;
    if (typeof width !== 'number' || !Number.isInteger(width) || width < 1
        || typeof depth !== 'number' || !Number.isInteger(depth) || depth < 1) {
        throw new Error(`Item "${itemId}": footprint dimensions must be positive integers`);
    }
    return Object.freeze({ width, depth });
}

function parseItem(itemId: string, raw: unknown): ItemDefinition {
    if (!isRecord(raw)) {
        throw new Error(`Item "${itemId}": definition must be a map`);
    }

    const category = raw.category;
    if (!isItemCategory(category)) {
        throw new Error(`Unknown category in YAML for "${itemId}": "${String(category)}". Valid categories: ${ITEM_CATEGORIES.join(', ')}`);
    }

    const maxHealth = raw.maxHealth;
    if (typeof maxHealth !== 'number' || !(maxHealth > 0)) {
        throw new Error(`Item "${itemId}": maxHealth must be a positive number`);
    }

    const storage = raw.storage;
    let storageCapacity = 0;
    if (storage !== undefined) {
        const capacity = isRecord(storage) ? storage.capacity : undefined;
        if (typeof capacity !== 'number' || capacity < 0) {
            throw new Error(`Item "${itemId}": storage must be { capacity: number }`);
        }
        storageCapacity = capacity;
    }

    return Object.freeze({
        id: itemId,
        category,
        cost: parseCost(itemId, 'cost', raw.cost),
        footprint: parseFootprint(itemId, raw.footprint),
        walkable: raw.walkable === true,
        isStorage: storage !== undefined,
        storageCapacity,
        maxHealth,
        repairCost: parseCost(itemId, 'repairCost', raw.repairCost),
    });
}

/**
 * Parse a catalog document of the form `items: { <id>: { ... } }`.
 * Throws on malformed data: the catalog is startup data, not player input.
 */
export function parseItemDefinitions(yamlText: string): ItemDefinition[] {
    const doc: unknown = parseYaml(yamlText);
    const items = isRecord(doc) ? doc.items : undefined;
    if (!isRecord(items)) {
        throw new Error('Item catalog YAML must have a top-level "items" map');
    }

    return Object.entries(items).map(([itemId, raw]) => parseItem(itemId, raw));
}

/** Definitions bundled with the game */
export function loadDefaultItemDefinitions(): ItemDefinition[] {
    return parseItemDefinitions(itemsYaml);
}
