import { describe, it, expect, beforeEach } from 'vitest';
import { RaftMotion } from '@/game/features/motion';
import { WaveField } from '@/game/ocean/wave-field';
import { createTestStructure, type TestStructure } from './helpers/test-structure';

const MASS_PER_TILE = 100;
const TURN_RATE = 0.15;
const DRAG = 0.6;

function createMotion(t: TestStructure, waves: WaveField): RaftMotion {
    return new RaftMotion({
        registry: t.registry,
        waves,
        massPerTile: MASS_PER_TILE,
        turnRatePerRudder: TURN_RATE,
        linearDrag: DRAG,
    });
}

describe('RaftMotion – flat sea', () => {
    let t: TestStructure;
    let waves: WaveField;
    let motion: RaftMotion;

    beforeEach(() => {
        t = createTestStructure();
        // No components: height 0, normal up, current (0.4, 0, 0)
        waves = new WaveField({ count: 0, baseHeight: 0.6, baseSpeed: 1, seed: 1 });
        motion = createMotion(t, waves);
    });

    it('should stay put while the structure is empty', () => {
        motion.tick(1);
        const pose = motion.pose();
        expect(pose.position).toEqual({ x: 0, y: 0, z: 0 });
        expect(pose.velocity).toEqual({ x: 0, y: 0, z: 0 });
    });

    it('should drift with the current and ignore the rudder without an engine', () => {
        t.registry.place({ x: 0, y: 0 }, t.item('foundation'));
        t.registry.place({ x: 1, y: 0 }, t.item('rudder'));
        motion.setRudder(1);

        motion.tick(1);
        const pose = motion.pose();
        expect(pose.heading).toBe(0);
        expect(pose.velocity).toEqual({ x: 0, y: 0, z: 0 });
        // Center of mass is x = 1; drift adds 0.4
        expect(pose.position.x).toBeCloseTo(1.4, 12);
        expect(pose.position.z).toBeCloseTo(0, 12);
        expect(pose.position.y).toBe(0);
        expect(pose.up.y).toBe(1);
    });

    it('should accelerate along the heading with engine thrust', () => {
        t.registry.place({ x: 0, y: 0 }, t.item('foundation'));
        t.registry.place({ x: 1, y: 0 }, t.item('engine'));

        motion.tick(1);
        // thrust 250 / mass 200, then one second of exponential drag
        const expected = 1.25 * Math.exp(-DRAG);
        const pose = motion.pose();
        expect(pose.velocity.z).toBeCloseTo(expected, 12);
        expect(pose.velocity.x).toBeCloseTo(0, 12);
        expect(pose.position.z).toBeCloseTo(expected, 12);
    });

    it('should not accelerate at zero throttle', () => {
        t.registry.place({ x: 0, y: 0 }, t.item('engine'));
        motion.setThrottle(0);
        motion.tick(1);
        expect(motion.pose().velocity.z).toBe(0);
    });

    it('should turn by rudder input, rudder count and turn rate', () => {
        t.registry.place({ x: 0, y: 0 }, t.item('engine'));
        t.registry.place({ x: 1, y: 0 }, t.item('rudder'));
        t.registry.place({ x: -1, y: 0 }, t.item('rudder'));

        motion.setRudder(5);
        motion.tick(1);
        expect(motion.pose().heading).toBeCloseTo(2 * TURN_RATE, 12);

        motion.setRudder(-1);
        motion.tick(1);
        expect(motion.pose().heading).toBeCloseTo(0, 12);
    });

    it('should point forward along the heading', () => {
        t.registry.place({ x: 0, y: 0 }, t.item('engine'));
        t.registry.place({ x: 1, y: 0 }, t.item('rudder'));
        motion.setRudder(1);
        for (let i = 0; i < 10; i++) {
            motion.tick(1);
        }

        const heading = motion.pose().heading;
        const fwd = motion.forward();
        expect(heading).toBeCloseTo(1.5, 12);
        expect(fwd.x).toBeCloseTo(Math.sin(1.5), 12);
        expect(fwd.z).toBeCloseTo(Math.cos(1.5), 12);
        expect(fwd.y).toBe(0);
    });
});

describe('RaftMotion – waves', () => {
    it('should float at the wave height under its center', () => {
        const t = createTestStructure();
        const waves = new WaveField({ count: 4, baseHeight: 0.6, baseSpeed: 1, seed: 12345 });
        const motion = createMotion(t, waves);
        t.registry.place({ x: 0, y: 0 }, t.item('foundation'));
        t.registry.place({ x: 1, y: 0 }, t.item('foundation'));

        waves.advance(2);
        motion.tick(0.5);

        const pose = motion.pose();
        expect(pose.position.y).toBeCloseTo(waves.height(pose.position), 12);
        expect(pose.up).toEqual(waves.normal(pose.position));
    });
});
