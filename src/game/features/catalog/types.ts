/**
 * Construction catalog types.
 */

export const ITEM_CATEGORIES = ['foundation', 'engine', 'rudder', 'storage', 'utility'] as const;

export type ItemCategory = typeof ITEM_CATEGORIES[number];

/** Resource id -> amount */
export type ResourceCost = Readonly<Record<string, number>>;

/** Cells covered along world X (width) and world Z (depth) */
export interface Footprint {
    readonly width: number;
    readonly depth: number;
}

export interface ItemDefinition {
    readonly id: string;
    readonly category: ItemCategory;
    readonly cost: ResourceCost;
    readonly footprint: Footprint;
    readonly walkable: boolean;
    readonly isStorage: boolean;
    /** 0 for non-storage items */
    readonly storageCapacity: number;
    readonly maxHealth: number;
    readonly repairCost: ResourceCost;
}

export function isItemCategory(value: unknown): value is ItemCategory {
    return ITEM_CATEGORIES.some(category => category === value);
}
