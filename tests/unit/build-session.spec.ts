import { describe, it, expect, beforeEach } from 'vitest';
import { BuildSession } from '@/game/features/build-session';
import type { BuildAnchor } from '@/game/features/build-session';
import { PlacementStatus } from '@/game/features/grid';
import { createTestStructure, recordEvents, type TestStructure } from './helpers/test-structure';
import { TestLedger } from './helpers/test-ledger';

/** Standing at the origin, looking along +Z: preview lands on cell (0, 1) */
const ORIGIN_ANCHOR: BuildAnchor = {
    position: { x: 0, y: 0, z: 0 },
    forward: { x: 0, y: 0, z: 1 },
};

describe('BuildSession', () => {
    let t: TestStructure;
    let ledger: TestLedger;
    let distance: number;
    let session: BuildSession;

    beforeEach(() => {
        t = createTestStructure();
        ledger = new TestLedger({ plank: 8, rope: 4 });
        distance = 2;
        session = new BuildSession({
            catalog: t.catalog,
            topology: t.topology,
            registry: t.registry,
            ledger,
            eventBus: t.eventBus,
            previewDistance: () => distance,
        });
    });

    describe('start', () => {
        it('should enter build mode with a preview in front of the anchor', () => {
            const started = recordEvents(t.eventBus, 'build:started');
            const result = session.start('foundation', ORIGIN_ANCHOR);

            expect(result.success).toBe(true);
            expect(session.state).toBe('active');
            expect(session.itemId).toBe('foundation');
            expect(session.preview).toEqual({
                itemId: 'foundation',
                position: { x: 0, y: 0, z: 2 },
                cell: { x: 0, y: 1 },
                valid: true,
                status: PlacementStatus.Valid,
            });
            expect(started).toEqual([{ itemId: 'foundation' }]);
        });

        it('should reject an unknown item and stay idle', () => {
            const started = recordEvents(t.eventBus, 'build:started');
            const result = session.start('sail', ORIGIN_ANCHOR);

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error).toBe('UnknownItem');
            }
            expect(session.state).toBe('idle');
            expect(started).toEqual([]);
        });

        it('should reject an item the ledger cannot cover', () => {
            const result = session.start('engine', ORIGIN_ANCHOR);

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error).toBe('InsufficientResources');
            }
            expect(session.isActive).toBe(false);
        });

        it('should treat a missing ledger as affording nothing', () => {
            session.setLedger(null);
            const result = session.start('foundation', ORIGIN_ANCHOR);
            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error).toBe('InsufficientResources');
            }
        });

        it('should cancel a running session before starting another', () => {
            const cancelled = recordEvents(t.eventBus, 'build:cancelled');
            ledger.set('plank', 20);
            ledger.set('rope', 10);
            session.start('foundation', ORIGIN_ANCHOR);

            expect(session.start('rudder').success).toBe(true);
            expect(session.itemId).toBe('rudder');
            expect(cancelled).toEqual([{ itemId: 'foundation', reason: 'restarted' }]);
        });

        it('should start from the last anchor seen by tick', () => {
            session.tick({ x: 4, y: 0, z: 0 }, { x: 0, y: 0, z: 1 });
            session.start('foundation');
            expect(session.preview?.cell).toEqual({ x: 2, y: 1 });
        });
    });

    describe('tick', () => {
        it('should ignore ticks while idle', () => {
            const changed = recordEvents(t.eventBus, 'build:previewChanged');
            session.tick({ x: 10, y: 0, z: 10 }, { x: 1, y: 0, z: 0 });
            expect(session.preview).toBeNull();
            expect(changed).toEqual([]);
        });

        it('should follow the anchor and announce only real changes', () => {
            const changed = recordEvents(t.eventBus, 'build:previewChanged');
            session.start('foundation', ORIGIN_ANCHOR);

            session.tick(ORIGIN_ANCHOR.position, ORIGIN_ANCHOR.forward);
            expect(changed).toEqual([]);

            session.tick({ x: 0, y: 0, z: 0 }, { x: 1, y: 0, z: 0 });
            expect(session.preview?.cell).toEqual({ x: 1, y: 0 });
            expect(changed).toEqual([{ itemId: 'foundation', cell: { x: 1, y: 0 }, valid: true }]);
        });

        it('should ignore the vertical part of the facing direction', () => {
            session.start('foundation', ORIGIN_ANCHOR);
            session.tick({ x: 0, y: 0, z: 0 }, { x: 0, y: -5, z: 3 });
            expect(session.preview?.position).toEqual({ x: 0, y: 0, z: 2 });
        });

        it('should place the preview at the anchor when looking straight down', () => {
            session.start('foundation', ORIGIN_ANCHOR);
            session.tick({ x: 4, y: 1, z: 4 }, { x: 0, y: -1, z: 0 });
            expect(session.preview?.cell).toEqual({ x: 2, y: 2 });
        });

        it('should read the preview distance every tick', () => {
            session.start('foundation', ORIGIN_ANCHOR);
            distance = 6;
            session.tick(ORIGIN_ANCHOR.position, ORIGIN_ANCHOR.forward);
            expect(session.preview?.cell).toEqual({ x: 0, y: 3 });
        });
    });

    describe('confirm', () => {
        it('should fail outside build mode', () => {
            const result = session.confirm();
            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error).toBe('NoActiveSession');
            }
        });

        it('should place the item, pay for it and keep going while affordable', () => {
            const placed = recordEvents(t.eventBus, 'tile:placed');
            session.start('foundation', ORIGIN_ANCHOR);

            const result = session.confirm();
            expect(result.success).toBe(true);
            if (result.success) {
                expect(result.cell).toEqual({ x: 0, y: 1 });
                expect(result.tile.itemId).toBe('foundation');
                expect(result.sessionEnded).toBe(false);
            }
            expect(ledger.snapshot()).toEqual({ plank: 4, rope: 2 });
            expect(placed).toHaveLength(1);
            expect(session.isActive).toBe(true);

            // Same anchor: the preview cell is now taken
            expect(session.preview?.valid).toBe(false);
            expect(session.preview?.status).toBe(PlacementStatus.Occupied);
        });

        it('should reject an occupied cell without paying', () => {
            const invalid = recordEvents(t.eventBus, 'build:placementInvalid');
            session.start('foundation', ORIGIN_ANCHOR);
            session.confirm();

            const result = session.confirm();
            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error).toBe('InvalidPlacement');
            }
            expect(ledger.snapshot()).toEqual({ plank: 4, rope: 2 });
            expect(t.registry.size).toBe(1);
            expect(session.isActive).toBe(true);
            expect(invalid).toEqual([{ itemId: 'foundation', reason: 'InvalidPlacement', cell: { x: 0, y: 1 } }]);
        });

        it('should reject a cell that does not touch the structure', () => {
            t.registry.place({ x: 0, y: 0 }, t.item('foundation'));
            session.start('foundation', {
                position: { x: 10, y: 0, z: 10 },
                forward: { x: 1, y: 0, z: 0 },
            });
            expect(session.preview?.status).toBe(PlacementStatus.NotAdjacent);

            const result = session.confirm();
            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error).toBe('InvalidPlacement');
            }
            expect(ledger.snapshot()).toEqual({ plank: 8, rope: 4 });
            expect(t.registry.size).toBe(1);
        });

        it('should center the structure on the first tile placed', () => {
            session.start('foundation', {
                position: { x: 0, y: 0, z: -2 },
                forward: { x: 0, y: 0, z: 1 },
            });
            expect(session.preview?.cell).toEqual({ x: 0, y: 0 });

            const result = session.confirm();
            expect(result.success).toBe(true);
            if (result.success) {
                expect(result.cell).toEqual({ x: 0, y: 0 });
                expect(result.tile.position).toEqual({ x: 0, y: 0, z: 0 });
                expect(t.registry.aggregate().centerOfMass).toEqual(result.tile.position);
            }
            expect(t.registry.size).toBe(1);
        });

        it('should end the session once the item is no longer affordable', () => {
            const cancelled = recordEvents(t.eventBus, 'build:cancelled');
            session.start('foundation', ORIGIN_ANCHOR);
            session.confirm();

            session.tick({ x: 0, y: 0, z: 2 }, { x: 0, y: 0, z: 1 });
            expect(session.preview?.cell).toEqual({ x: 0, y: 2 });

            const result = session.confirm();
            expect(result.success).toBe(true);
            if (result.success) {
                expect(result.sessionEnded).toBe(true);
            }
            expect(session.state).toBe('idle');
            expect(session.preview).toBeNull();
            expect(ledger.snapshot()).toEqual({ plank: 0, rope: 0 });
            expect(cancelled).toEqual([{ itemId: 'foundation', reason: 'exhausted' }]);
        });

        it('should leave the ledger whole when a deduction is rejected', () => {
            ledger.rejectDeductions.add('rope');
            session.start('foundation', ORIGIN_ANCHOR);

            const result = session.confirm();
            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error).toBe('InsufficientResources');
            }
            expect(ledger.snapshot()).toEqual({ plank: 8, rope: 4 });
            expect(t.registry.size).toBe(0);
            expect(session.isActive).toBe(true);
        });

        it('should register every cell of a multi-cell item', () => {
            ledger.set('plank', 14);
            ledger.set('rope', 6);
            session.start('large_foundation', ORIGIN_ANCHOR);

            const result = session.confirm();
            expect(result.success).toBe(true);
            expect(t.registry.occupancy.size).toBe(4);
            expect(t.registry.getTileAt({ x: 1, y: 2 })?.itemId).toBe('large_foundation');
        });
    });

    describe('cancel', () => {
        it('should fail outside build mode', () => {
            const result = session.cancel();
            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error).toBe('NoActiveSession');
            }
        });

        it('should return to idle without touching resources', () => {
            const cancelled = recordEvents(t.eventBus, 'build:cancelled');
            session.start('foundation', ORIGIN_ANCHOR);

            expect(session.cancel().success).toBe(true);
            expect(session.state).toBe('idle');
            expect(session.itemId).toBeNull();
            expect(ledger.snapshot()).toEqual({ plank: 8, rope: 4 });
            expect(cancelled).toEqual([{ itemId: 'foundation', reason: 'user' }]);
        });
    });
});
