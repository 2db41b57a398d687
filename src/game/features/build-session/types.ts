/**
 * Build session types.
 */

import type { GridCoord } from '../../coordinates';
import type { PlacementStatus } from '../grid/types';
import type { Vec3 } from '@/utilities/vec3';

export type BuildSessionState = 'idle' | 'active';

/** Why an active session returned to idle */
export type BuildEndReason =
    /** cancel() was called */
    | 'user'
    /** The item can no longer be afforded after a placement */
    | 'exhausted'
    /** start() was called while already active */
    | 'restarted';

/** Where the building actor stands and faces */
export interface BuildAnchor {
    position: Vec3;
    forward: Vec3;
}

/** Current placement preview of an active session */
export interface BuildPreview {
    itemId: string;
    /** Un-snapped world position the cell was derived from */
    position: Vec3;
    cell: GridCoord;
    valid: boolean;
    status: PlacementStatus;
}
