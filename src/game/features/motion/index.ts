export { RaftMotion } from './raft-motion';
export type { RaftMotionConfig, RaftPose } from './raft-motion';
