export { Goal } from "./Goal";
export { GoalStack, type GoalStackListener } from "./GoalStack";
export { BoredGoal } from "./BoredGoal";
export { KillTargetGoal, KILL_TARGET_PRIORITY } from "./KillTargetGoal";
export { ApproachGoal, type ApproachTarget } from "./ApproachGoal";
export { FleeGoal } from "./FleeGoal";
export { FollowEntityGoal } from "./FollowEntityGoal";
export { WanderGoal } from "./WanderGoal";
export { MoveDirectionGoal } from "./MoveDirectionGoal";
export { SeekItemGoal } from "./SeekItemGoal";
export { SearchLastKnownPositionGoal } from "./SearchLastKnownPositionGoal";
export { ReturnToSpawnGoal } from "./ReturnToSpawnGoal";
export { DefendTargetGoal } from "./DefendTargetGoal";
