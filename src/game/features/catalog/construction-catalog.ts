import { commandFailed, commandSuccess, type CommandResult } from '../../commands/command-result';
import { LogHandler } from '@/utilities/log-handler';
import { loadDefaultItemDefinitions } from './loader';
import type { ItemDefinition } from './types';

const log = new LogHandler('ConstructionCatalog');

/** Item id that unknown or legacy tile types fall back to on restore */
export const FALLBACK_ITEM_ID = 'foundation';

/**
 * Immutable itemId -> ItemDefinition table.
 * Loaded once at startup; a miss is reported as UnknownItem.
 */
export class ConstructionCatalog {
    private readonly definitions: ReadonlyMap<string, ItemDefinition>;

    constructor(definitions: readonly ItemDefinition[]) {
        const map = new Map<string, ItemDefinition>();
        for (const def of definitions) {
            if (map.has(def.id)) {
                throw new Error(`Duplicate item id in catalog: "${def.id}"`);
            }
            map.set(def.id, def);
        }
        this.definitions = map;
        log.debug(`Loaded ${map.size} item definitions`);
    }

    /** Catalog backed by the bundled items.yaml */
    static createDefault(): ConstructionCatalog {
        return new ConstructionCatalog(loadDefaultItemDefinitions());
    }

    has(itemId: string): boolean {
        return this.definitions.has(itemId);
    }

    get(itemId: string): ItemDefinition | undefined {
        return this.definitions.get(itemId);
    }

    lookup(itemId: string): CommandResult<{ definition: ItemDefinition }> {
        const definition = this.definitions.get(itemId);
        if (!definition) {
            return commandFailed('UnknownItem', `No item "${itemId}" in catalog`);
        }
        return commandSuccess({ definition });
    }

    all(): ItemDefinition[] {
        return [...this.definitions.values()];
    }

    get size(): number {
        return this.definitions.size;
    }
}
