/**
 * Reference motion integrator for a raft.
 *
 * Reads the registry aggregate and wave samples every tick; never writes
 * to either. The raft's tile layout is in local space (grid cells); this
 * class tracks where that local frame sits in the world.
 */

import type { TickSystem } from '../../tick-system';
import type { WaveField } from '../../ocean/wave-field';
import type { StructureRegistry } from '../structure/structure-registry';
import { UP_VEC3, addVec3, clamp, type Vec3 } from '@/utilities/vec3';

export interface RaftMotionConfig {
    registry: StructureRegistry;
    waves: WaveField;
    massPerTile: number;
    turnRatePerRudder: number;
    linearDrag: number;
}

export interface RaftPose {
    /** World position of the structure's center of mass */
    position: Vec3;
    /** Yaw in radians; 0 faces +Z */
    heading: number;
    /** Surface normal under the raft */
    up: Vec3;
    /** Horizontal velocity from thrust (excludes current drift) */
    velocity: Vec3;
}

export class RaftMotion implements TickSystem {
    readonly name = 'motion';

    private readonly registry: StructureRegistry;
    private readonly waves: WaveField;
    private readonly massPerTile: number;
    private readonly turnRatePerRudder: number;
    private readonly linearDrag: number;

    /** World offset of the local grid origin */
    private offset: Vec3 = { x: 0, y: 0, z: 0 };
    private heading = 0;
    private velocity: Vec3 = { x: 0, y: 0, z: 0 };
    private up: Vec3 = { ...UP_VEC3 };
    private rudderInput = 0;
    private throttle = 1;

    constructor(config: RaftMotionConfig) {
        this.registry = config.registry;
        this.waves = config.waves;
        this.massPerTile = config.massPerTile;
        this.turnRatePerRudder = config.turnRatePerRudder;
        this.linearDrag = config.linearDrag;
    }

    /** -1 (hard left) .. 1 (hard right) */
    setRudder(input: number): void {
        this.rudderInput = clamp(input, -1, 1);
    }

    /** 0 (engines idle) .. 1 (full thrust) */
    setThrottle(value: number): void {
        this.throttle = clamp(value, 0, 1);
    }

    /** Unit vector the raft faces on the horizontal plane */
    forward(): Vec3 {
        return { x: Math.sin(this.heading), y: 0, z: Math.cos(this.heading) };
    }

    pose(): RaftPose {
        const center = this.registry.aggregate().centerOfMass;
        return {
            position: {
                x: this.offset.x + center.x,
                y: this.offset.y,
                z: this.offset.z + center.z,
            },
            heading: this.heading,
            up: { ...this.up },
            velocity: { ...this.velocity },
        };
    }

    tick(dt: number): void {
        const aggregate = this.registry.aggregate();
        if (aggregate.tileCount === 0) return;

        const mass = aggregate.tileCount * this.massPerTile;
        const center = aggregate.centerOfMass;
        const worldCenter = { x: this.offset.x + center.x, y: 0, z: this.offset.z + center.z };

        // Steering and thrust need a working engine
        if (aggregate.canMove) {
            this.heading += this.rudderInput * aggregate.steering * this.turnRatePerRudder * dt;

            const accel = (aggregate.thrust * this.throttle) / mass;
            const fwd = this.forward();
            this.velocity.x += fwd.x * accel * dt;
            this.velocity.z += fwd.z * accel * dt;
        }

        const damping = Math.exp(-this.linearDrag * dt);
        this.velocity.x *= damping;
        this.velocity.z *= damping;

        const current = this.waves.current(worldCenter);
        const drift = addVec3(this.velocity, current);
        this.offset.x += drift.x * dt;
        this.offset.z += drift.z * dt;

        // Float on the surface under the new center
        const floatPoint = { x: this.offset.x + center.x, y: 0, z: this.offset.z + center.z };
        this.offset.y = this.waves.height(floatPoint);
        this.up = this.waves.normal(floatPoint);
    }
}
