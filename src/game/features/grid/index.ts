/**
 * Grid Topology Feature Module
 *
 * Public API:
 * - GridTopology: worldToGrid / gridToWorld / footprintCenter
 * - Validators: validatePlacement, isValidPlacement
 * - Helpers: footprintCells, frontier, touchesStructure
 */

export type { OccupancyView, PlacementResult } from './types';
export { PlacementStatus } from './types';
export {
    GridTopology,
    footprintCells,
    frontier,
    isValidPlacement,
    roundHalfAwayFromZero,
    touchesStructure,
    validatePlacement,
} from './grid-topology';
