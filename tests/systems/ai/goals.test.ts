import { describe, it, expect, vi } from "vitest";
import { AIComponent } from "@/domain/simulation/systems/agents/ai/AIComponent";
import type { AIContext } from "@/domain/simulation/systems/agents/ai/AIContext";
import type { AIBehavior } from "@/domain/simulation/systems/agents/ai/actions/ActionGatherBus";
import {
  ApproachGoal,
  BoredGoal,
  DefendTargetGoal,
  FleeGoal,
  FollowEntityGoal,
  type Goal,
  KillTargetGoal,
  MoveDirectionGoal,
  ReturnToSpawnGoal,
  SearchLastKnownPositionGoal,
  SeekItemGoal,
  WanderGoal,
} from "@/domain/simulation/systems/agents/ai/goals";
import {
  ItemUsageBehavior,
  MeleeAttackBehavior,
  RangedAttackBehavior,
} from "@/domain/simulation/systems/agents/ai/behaviors";
import { AIEventName, BehaviorType, GoalKind } from "@/shared/constants/AIEnums";
import { InventoryItemKind } from "@/shared/constants/ItemEnums";
import { FixedRandom, TestWorld, createTestContext, type TestContextOptions } from "../../setup";

const OPEN_5X5 = [".....", ".....", ".....", ".....", "....."];

/**
 * Puts `goal` on top of a bored root, the way the planner would have.
 */
function stage(context: AIContext, goal: Goal): Goal {
  const root = new BoredGoal();
  context.goalStack.push(root);
  goal.originalIntent = root;
  context.goalStack.push(goal);
  return root;
}

function topOf(context: AIContext): string | undefined {
  return context.goalStack.peek()?.describe();
}

function kinds(context: AIContext): GoalKind[] {
  return context.goalStack.getGoals().map((goal) => goal.kind);
}

function heroIn(
  rows: readonly string[],
  x: number,
  y: number,
  options: TestContextOptions = {},
): { world: TestWorld; build: (extra?: TestContextOptions) => AIContext } {
  const world = TestWorld.fromRows(rows);
  world.addActor({ id: "hero", position: { x, y } });
  return {
    world,
    build: (extra = {}) => createTestContext(world, "hero", { ...options, ...extra }),
  };
}

describe("MoveDirectionGoal", () => {
  it("runs the move and completes", () => {
    const { world, build } = heroIn(["..."], 0, 0);
    const context = build();
    const move = new MoveDirectionGoal({ x: 1, y: 0 });
    stage(context, move);

    move.takeAction(context);

    expect(world.actionLog).toEqual(["hero move(1,0)"]);
    expect(world.getActor("hero")?.position).toEqual({ x: 1, y: 0 });
    expect(move.hasCompleted).toBe(true);
    expect(context.actionTaken).toBe(true);
  });

  it("fails back to its intent when the move is rejected", () => {
    const { world, build } = heroIn([".#."], 0, 0);
    const context = build();
    const move = new MoveDirectionGoal({ x: 1, y: 0 });
    stage(context, move);

    move.takeAction(context);

    expect(world.actionLog).toEqual([]);
    expect(move.hasFailed).toBe(true);
    expect(kinds(context)).toEqual([GoalKind.BORED]);
    expect(context.actionTaken).toBe(false);
  });
});

describe("ApproachGoal", () => {
  it("pushes the first step of the path", () => {
    const { build } = heroIn(["......"], 0, 0);
    const context = build();
    stage(context, new ApproachGoal({ position: { x: 4, y: 0 } }, 1));

    context.goalStack.peek()?.takeAction(context);

    expect(topOf(context)).toBe(`${GoalKind.MOVE_DIRECTION}(1,0)`);
    expect(context.actionTaken).toBe(false);
  });

  it("is finished within the desired distance", () => {
    const { build } = heroIn(["......"], 3, 0);
    const context = build();
    const approach = new ApproachGoal({ position: { x: 4, y: 0 } }, 1);
    expect(approach.isFinished(context)).toBe(true);
    expect(new ApproachGoal({ position: { x: 4, y: 0 } }, 0).isFinished(context)).toBe(false);
  });

  it("fails when no path exists", () => {
    const { build } = heroIn(["..#.."], 0, 0);
    const context = build();
    const approach = new ApproachGoal({ position: { x: 4, y: 0 } }, 0);
    stage(context, approach);

    approach.takeAction(context);

    expect(approach.hasFailed).toBe(true);
    expect(kinds(context)).toEqual([GoalKind.BORED]);
  });

  it("keeps heading for a tracked actor's last cell after it dies", () => {
    const { world, build } = heroIn(["......"], 0, 0);
    world.addActor({ id: "rat", position: { x: 4, y: 0 } });
    const context = build();
    const approach = new ApproachGoal({ entityId: "rat" });

    expect(approach.refreshTarget(context)).toEqual({ x: 4, y: 0 });
    world.kill("rat");
    expect(approach.refreshTarget(context)).toEqual({ x: 4, y: 0 });
  });

  it("fails when a tracked actor was never found", () => {
    const { build } = heroIn(["......"], 0, 0);
    const context = build();
    const approach = new ApproachGoal({ entityId: "ghost" });
    stage(context, approach);

    approach.takeAction(context);
    expect(approach.hasFailed).toBe(true);
  });
});

describe("KillTargetGoal", () => {
  function arena(ratAt: { x: number; y: number }, behaviors: AIBehavior[] = []) {
    const { world, build } = heroIn(OPEN_5X5, 0, 0, { behaviors });
    world.addActor({
      id: "rat",
      faction: "heroes",
      position: ratAt,
      health: { current: 3, max: 3 },
    });
    const context = build();
    const goal = new KillTargetGoal("rat");
    stage(context, goal);
    return { world, context, goal };
  }

  it("attacks an adjacent target in melee", () => {
    const { world, context, goal } = arena({ x: 1, y: 0 }, [new MeleeAttackBehavior()]);

    goal.takeAction(context);

    expect(world.actionLog).toEqual(["hero attack(rat)"]);
    expect(world.getActor("rat")?.health).toEqual({ current: 2, max: 3 });
    expect(context.actionTaken).toBe(true);
  });

  it("closes in when no tier offers anything", () => {
    const { context, goal } = arena({ x: 3, y: 0 });

    goal.takeAction(context);

    expect(topOf(context)).toBe(`${GoalKind.APPROACH}(rat, 1)`);
    expect(context.actionTaken).toBe(false);
  });

  it("fails when adjacent but nothing can attack", () => {
    const { context, goal } = arena({ x: 1, y: 0 });

    goal.takeAction(context);

    expect(goal.hasFailed).toBe(true);
    expect(kinds(context)).toEqual([GoalKind.BORED]);
  });

  it("shoots from range and reports the hit", () => {
    const onHit = vi.fn();
    const ranged = new RangedAttackBehavior({ range: 5, onHit });
    const { world, context, goal } = arena({ x: 3, y: 0 }, [ranged]);

    goal.takeAction(context);

    expect(world.actionLog).toEqual(["hero shoot(rat)"]);
    expect(ranged.hitCount).toBe(1);
    expect(onHit).toHaveBeenCalledWith(
      expect.objectContaining({ id: "hero" }),
      expect.objectContaining({ id: "rat" }),
    );
  });

  it("prefers melee over ranged when adjacent", () => {
    const { world, context, goal } = arena({ x: 1, y: 0 }, [
      new RangedAttackBehavior({ range: 5 }),
      new MeleeAttackBehavior(),
    ]);

    goal.takeAction(context);
    expect(world.actionLog).toEqual(["hero attack(rat)"]);
  });

  it("throws an offensive item when that is all it has", () => {
    const { world, build } = heroIn(OPEN_5X5, 0, 0, { behaviors: [new ItemUsageBehavior()] });
    world.addActor({ id: "rat", faction: "heroes", position: { x: 2, y: 0 }, health: { current: 3, max: 3 } });
    const hero = world.getActor("hero");
    if (hero) {
      hero.inventory = [{ id: "dart", name: "dart", kind: InventoryItemKind.OFFENSIVE, range: 3, charges: 1 }];
    }
    const context = build();
    const goal = new KillTargetGoal("rat");
    stage(context, goal);

    goal.takeAction(context);
    expect(world.actionLog).toEqual(["hero use(dart,rat)"]);
  });

  it("is finished once the target is dead or out of sight", () => {
    const { world, context, goal } = arena({ x: 3, y: 0 });
    expect(goal.isFinished(context)).toBe(false);

    world.kill("rat");
    expect(goal.isFinished(context)).toBe(true);
  });

  it("is finished when the target is beyond vision", () => {
    const world = TestWorld.fromRows(OPEN_5X5);
    world.addActor({ id: "hero", position: { x: 0, y: 0 }, visionRange: 1 });
    world.addActor({ id: "rat", faction: "heroes", position: { x: 3, y: 0 } });
    const context = createTestContext(world, "hero");

    expect(new KillTargetGoal("rat").isFinished(context)).toBe(true);
  });
});

describe("FleeGoal", () => {
  it("steps straight away from the threat", () => {
    const { world, build } = heroIn(["......."], 3, 0);
    world.addActor({ id: "orc", faction: "heroes", position: { x: 2, y: 0 } });
    const context = build();
    const flee = new FleeGoal("orc", 3, 6);
    stage(context, flee);

    flee.takeAction(context);

    expect(flee.elapsed).toBe(1);
    expect(topOf(context)).toBe(`${GoalKind.MOVE_DIRECTION}(1,0)`);
  });

  it("heads for an ally when that does not close on the threat", () => {
    const { world, build } = heroIn(OPEN_5X5, 2, 2);
    world.addActor({ id: "orc", faction: "heroes", position: { x: 2, y: 0 } });
    world.addActor({ id: "friend", position: { x: 0, y: 4 } });
    const context = build();
    const flee = new FleeGoal("orc", 3, 6);
    stage(context, flee);

    flee.takeAction(context);

    expect(topOf(context)).toBe(`${GoalKind.MOVE_DIRECTION}(-1,1)`);
  });

  it("waits when cornered", () => {
    const { world, build } = heroIn(["......."], 6, 0);
    world.addActor({ id: "orc", faction: "heroes", position: { x: 5, y: 0 } });
    const context = build();
    const flee = new FleeGoal("orc", 3, 6);
    stage(context, flee);

    flee.takeAction(context);

    expect(kinds(context)).toEqual([GoalKind.BORED, GoalKind.FLEE]);
    expect(context.actionTaken).toBe(false);
  });

  it("drinks a potion offered as a defensive action", () => {
    const { world, build } = heroIn(["......."], 3, 0, { behaviors: [new ItemUsageBehavior()] });
    world.addActor({ id: "orc", faction: "heroes", position: { x: 2, y: 0 } });
    const hero = world.getActor("hero");
    if (hero) {
      hero.health = { current: 1, max: 10 };
      hero.inventory = [{ id: "potion", name: "potion", kind: InventoryItemKind.HEALING, charges: 1 }];
    }
    const context = build();
    const flee = new FleeGoal("orc", 3, 6);
    stage(context, flee);

    flee.takeAction(context);

    expect(world.actionLog).toEqual(["hero use(potion)"]);
    expect(hero?.health).toEqual({ current: 6, max: 10 });
  });

  it("only finishes after its duration and once safe", () => {
    const { world, build } = heroIn(["......."], 3, 0);
    world.addActor({ id: "orc", faction: "heroes", position: { x: 2, y: 0 } });
    const context = build();
    const flee = new FleeGoal("orc", 1, 6);
    stage(context, flee);

    world.kill("orc");
    expect(flee.isFinished(context)).toBe(false);

    flee.takeAction(context);
    expect(flee.isFinished(context)).toBe(true);
  });

  it("stays active past its duration while the threat is close and in view", () => {
    const { world, build } = heroIn([".........."], 3, 0);
    const orc = world.addActor({ id: "orc", faction: "heroes", position: { x: 2, y: 0 } });
    const context = build();
    const flee = new FleeGoal("orc", 1, 6);
    stage(context, flee);

    flee.takeAction(context);
    expect(flee.elapsed).toBe(1);
    expect(flee.isFinished(context)).toBe(false);

    orc.position = { x: 7, y: 0 };
    expect(flee.isFinished(context)).toBe(false);
    orc.position = { x: 9, y: 0 };
    expect(flee.isFinished(context)).toBe(true);
  });

  it("runs from where it last saw a threat that slipped out of view", () => {
    const { world, build } = heroIn([".........."], 3, 0);
    const orc = world.addActor({ id: "orc", faction: "heroes", position: { x: 2, y: 0 } });
    const first = build();
    const flee = new FleeGoal("orc", 5, 6);
    stage(first, flee);
    flee.takeAction(first);
    first.goalStack.pop();

    const hero = world.getActor("hero");
    if (hero) hero.visionRange = 2;
    orc.position = { x: 6, y: 0 };
    const second = build({ component: first.state });
    flee.takeAction(second);

    expect(flee.elapsed).toBe(2);
    expect(second.canSee(orc)).toBe(false);
    expect(topOf(second)).toBe(`${GoalKind.MOVE_DIRECTION}(1,0)`);
  });
});

describe("DefendTargetGoal", () => {
  function guarding(boss: { x: number; vision: number }) {
    const { world, build } = heroIn(["..............."], 0, 0);
    world.addActor({ id: "boss", position: { x: boss.x, y: 0 }, visionRange: boss.vision });
    return { world, build };
  }

  it("goes after what the protected ally sees before its own enemies", () => {
    const { world, build } = guarding({ x: 10, vision: 3 });
    world.addActor({ id: "rat", faction: "heroes", position: { x: 2, y: 0 } });
    world.addActor({ id: "orc", faction: "heroes", position: { x: 13, y: 0 } });
    const context = build();
    const defend = new DefendTargetGoal("boss");
    stage(context, defend);

    expect(context.enemiesVisibleTo(world.getActor("boss") ?? context.actor).map((e) => e.actor.id)).toEqual(["orc"]);
    defend.takeAction(context);

    expect(topOf(context)).toBe(`${GoalKind.APPROACH}(orc, 1)`);
  });

  it("fights its own enemy when the ally sees none", () => {
    const { world, build } = guarding({ x: 10, vision: 3 });
    world.addActor({ id: "rat", faction: "heroes", position: { x: 2, y: 0 } });
    const context = build();
    const defend = new DefendTargetGoal("boss");
    stage(context, defend);

    expect(defend.isFinished(context)).toBe(false);
    defend.takeAction(context);

    expect(topOf(context)).toBe(`${GoalKind.KILL_TARGET}(rat)`);
  });

  it("is finished when nobody sees an enemy or the ally is gone", () => {
    const { world, build } = guarding({ x: 5, vision: 8 });
    const defend = new DefendTargetGoal("boss");
    expect(defend.isFinished(build())).toBe(true);
    expect(defend.describe()).toBe(`${GoalKind.DEFEND_TARGET}(boss)`);

    world.addActor({ id: "orc", faction: "heroes", position: { x: 12, y: 0 } });
    expect(defend.isFinished(build())).toBe(false);

    world.kill("boss");
    expect(defend.isFinished(build())).toBe(true);
  });

  it("fails back to its intent when the ally is dead", () => {
    const { world, build } = guarding({ x: 5, vision: 8 });
    world.kill("boss");
    const context = build();
    const defend = new DefendTargetGoal("boss");
    stage(context, defend);

    defend.takeAction(context);

    expect(defend.hasFailed).toBe(true);
    expect(kinds(context)).toEqual([GoalKind.BORED]);
  });
});

describe("FollowEntityGoal", () => {
  it("approaches a leader that is too far away", () => {
    const { world, build } = heroIn(["........"], 0, 0);
    world.addActor({ id: "boss", position: { x: 5, y: 0 } });
    const context = build();
    const follow = new FollowEntityGoal("boss", 2);
    stage(context, follow);

    expect(follow.isFinished(context)).toBe(false);
    follow.takeAction(context);
    expect(topOf(context)).toBe(`${GoalKind.APPROACH}(boss, 2)`);
  });

  it("aborts when an enemy comes into view", () => {
    const { world, build } = heroIn(["........"], 0, 0);
    world.addActor({ id: "boss", position: { x: 5, y: 0 } });
    world.addActor({ id: "orc", faction: "heroes", position: { x: 1, y: 0 } });
    const context = build();

    expect(new FollowEntityGoal("boss", 2).isFailed(context)).toBe(true);
  });

  it("is finished when the leader is close or gone", () => {
    const { world, build } = heroIn(["........"], 0, 0);
    world.addActor({ id: "boss", position: { x: 2, y: 0 } });
    const context = build();
    const follow = new FollowEntityGoal("boss", 2);

    expect(follow.isFinished(context)).toBe(true);
    world.moveActor("boss", { x: 6, y: 0 });
    expect(follow.isFinished(context)).toBe(false);
    world.kill("boss");
    expect(follow.isFinished(context)).toBe(true);
  });
});

describe("WanderGoal", () => {
  it("steps to an open neighbour and finishes once the step resolves", () => {
    const { build } = heroIn(["...", "...", "..."], 1, 1);
    const context = build();
    const wander = new WanderGoal();
    stage(context, wander);

    wander.takeAction(context);
    expect(topOf(context)).toBe(`${GoalKind.MOVE_DIRECTION}(0,-1)`);
    expect(wander.isFinished(context)).toBe(false);

    context.goalStack.peek()?.takeAction(context);
    expect(wander.isFinished(context)).toBe(true);
  });

  it("stays inside its radius", () => {
    const { build } = heroIn(["...", "...", "..."], 1, 1);
    const context = build();
    const wander = new WanderGoal({ x: 1, y: 1 }, 0);
    stage(context, wander);

    wander.takeAction(context);

    expect(kinds(context)).toEqual([GoalKind.BORED, GoalKind.WANDER]);
    expect(wander.isFinished(context)).toBe(true);
  });

  it("picks among open cells with the random source", () => {
    const { build } = heroIn(["...", "...", "..."], 1, 1);
    // 8 open cells: floor(0.99 * 8) = 7, the last of DIRECTIONS_8 (north-west)
    const context = build({ random: new FixedRandom(0.99) });
    const wander = new WanderGoal();
    stage(context, wander);

    wander.takeAction(context);
    expect(topOf(context)).toBe(`${GoalKind.MOVE_DIRECTION}(-1,-1)`);
  });
});

describe("SeekItemGoal", () => {
  it("walks to the item", () => {
    const { world, build } = heroIn(["...."], 0, 0);
    world.addItem({ id: "gem", name: "gem", position: { x: 2, y: 0 } });
    const context = build();
    const seek = new SeekItemGoal("gem");
    stage(context, seek);

    seek.takeAction(context);
    expect(topOf(context)).toBe(`${GoalKind.APPROACH}(2,0, 0)`);
  });

  it("picks the item up when standing on it", () => {
    const { world, build } = heroIn(["...."], 2, 0);
    world.addItem({ id: "gem", name: "gem", position: { x: 2, y: 0 } });
    const context = build();
    const seek = new SeekItemGoal("gem");
    stage(context, seek);

    seek.takeAction(context);

    expect(world.actionLog).toEqual(["hero pickup(gem)"]);
    expect(seek.hasCompleted).toBe(true);
    expect(world.getActor("hero")?.inventory.map((item) => item.id)).toEqual(["gem"]);
  });

  it("is finished and fails once the item is gone", () => {
    const { build } = heroIn(["...."], 0, 0);
    const context = build();
    const seek = new SeekItemGoal("gem");
    stage(context, seek);

    expect(seek.isFinished(context)).toBe(true);
    seek.takeAction(context);
    expect(seek.hasFailed).toBe(true);
  });
});

describe("SearchLastKnownPositionGoal", () => {
  function searching(heroX: number, turnsLeft: number) {
    const component = new AIComponent("hero", {}, 3);
    component.lastKnownEnemyPosition = { x: 3, y: 0 };
    component.searchTurnsRemaining = turnsLeft;
    const { world, build } = heroIn(["......"], heroX, 0, { component });
    const context = build();
    const search = new SearchLastKnownPositionGoal();
    stage(context, search);
    return { world, context, search, component };
  }

  it("goes to the remembered position first", () => {
    const { context, search } = searching(0, 2);

    search.takeAction(context);
    expect(topOf(context)).toBe(`${GoalKind.APPROACH}(3,0, 0)`);
  });

  it("wanders around the spot once there, spending a search turn", () => {
    const { context, search, component } = searching(3, 2);

    search.takeAction(context);

    expect(component.searchTurnsRemaining).toBe(1);
    expect(kinds(context)).toEqual([GoalKind.BORED, GoalKind.SEARCH_LAST_KNOWN_POSITION, GoalKind.WANDER]);
  });

  it("heads for a new alarm position after searching the old one", () => {
    const { context, search, component } = searching(3, 2);
    search.takeAction(context);
    context.goalStack.pop();

    component.hearAlarm({ x: 0, y: 0 }, 4);
    search.takeAction(context);

    expect(component.searchTurnsRemaining).toBe(4);
    expect(topOf(context)).toBe(`${GoalKind.APPROACH}(0,0, 0)`);
  });

  it("forgets the enemy when out of search turns", () => {
    const { context, search, component } = searching(3, 0);

    search.takeAction(context);

    expect(search.hasCompleted).toBe(true);
    expect(component.lastKnownEnemyPosition).toBeUndefined();
  });

  it("is finished when an enemy is back in view", () => {
    const component = new AIComponent("hero", {}, 3);
    component.lastKnownEnemyPosition = { x: 3, y: 0 };
    const { world, build } = heroIn(["......"], 0, 0, { component });
    world.addActor({ id: "orc", faction: "heroes", position: { x: 5, y: 0 } });

    expect(new SearchLastKnownPositionGoal().isFinished(build())).toBe(true);
  });
});

describe("ReturnToSpawnGoal", () => {
  function awayFromHome() {
    const { world, build } = heroIn(["......"], 4, 0, {
      actorOptions: { spawnPosition: { x: 0, y: 0 } },
    });
    const context = build();
    const home = new ReturnToSpawnGoal();
    stage(context, home);
    return { world, context, home };
  }

  it("approaches the spawn cell", () => {
    const { context, home } = awayFromHome();

    home.takeAction(context);
    expect(topOf(context)).toBe(`${GoalKind.APPROACH}(0,0, 0)`);
  });

  it("fails after its approach failed", () => {
    const { context, home } = awayFromHome();

    home.takeAction(context);
    context.goalStack.peek()?.fail(context, "blocked");
    expect(context.goalStack.peek()).toBe(home);

    home.takeAction(context);
    expect(home.hasFailed).toBe(true);
    expect(kinds(context)).toEqual([GoalKind.BORED]);
  });

  it("is finished at spawn or when an enemy shows up", () => {
    const { world, context, home } = awayFromHome();
    expect(home.isFinished(context)).toBe(false);

    world.addActor({ id: "orc", faction: "heroes", position: { x: 5, y: 0 } });
    expect(home.isFinished(createTestContext(world, "hero", {
      actorOptions: { spawnPosition: { x: 0, y: 0 } },
    }))).toBe(true);
  });
});

describe("BoredGoal", () => {
  function idle(options: TestContextOptions = {}) {
    const { world, build } = heroIn(["........", "........", "........"], 0, 1, options);
    return { world, build };
  }

  function think(context: AIContext): string | undefined {
    const bored = new BoredGoal();
    context.goalStack.push(bored);
    bored.takeAction(context);
    return topOf(context);
  }

  it("goes after the nearest visible enemy", () => {
    const { world, build } = idle();
    world.addActor({ id: "far", faction: "heroes", position: { x: 6, y: 1 } });
    world.addActor({ id: "near", faction: "heroes", position: { x: 3, y: 1 } });

    expect(think(build())).toBe(`${GoalKind.KILL_TARGET}(near)`);
  });

  it("catches up with its protection target while no enemy is around", () => {
    const { world, build } = idle({ actorOptions: { protectionTargetId: "boss", followDistance: 2 } });
    world.addActor({ id: "boss", position: { x: 6, y: 1 } });

    expect(think(build())).toBe(`${GoalKind.FOLLOW_ENTITY}(boss, 2)`);
  });

  it("guards its protection target instead of following when an enemy is in view", () => {
    const { world, build } = idle({ actorOptions: { protectionTargetId: "boss", followDistance: 2 } });
    world.addActor({ id: "boss", position: { x: 6, y: 1 } });
    world.addActor({ id: "orc", faction: "heroes", position: { x: 2, y: 1 } });

    expect(think(build())).toBe(`${GoalKind.DEFEND_TARGET}(boss)`);
  });

  it("guards when only the protection target sees an enemy", () => {
    const { world, build } = idle({ actorOptions: { protectionTargetId: "boss", followDistance: 2 } });
    const hero = world.getActor("hero");
    if (hero) hero.visionRange = 2;
    world.addActor({ id: "boss", position: { x: 6, y: 1 } });
    world.addActor({ id: "orc", faction: "heroes", position: { x: 7, y: 2 } });

    expect(think(build())).toBe(`${GoalKind.DEFEND_TARGET}(boss)`);
  });

  it("fights on its own once the protection target is dead", () => {
    const { world, build } = idle({ actorOptions: { protectionTargetId: "boss", followDistance: 2 } });
    world.addActor({ id: "boss", position: { x: 6, y: 1 }, isDead: true });
    world.addActor({ id: "orc", faction: "heroes", position: { x: 2, y: 1 } });

    expect(think(build())).toBe(`${GoalKind.KILL_TARGET}(orc)`);
  });

  it("searches where an enemy was last seen", () => {
    const component = new AIComponent("hero", {}, 3);
    component.lastKnownEnemyPosition = { x: 5, y: 1 };
    component.searchTurnsRemaining = 3;
    const { build } = idle({ component });

    expect(think(build())).toBe(GoalKind.SEARCH_LAST_KNOWN_POSITION);
  });

  it("collects a visible item on a successful roll", () => {
    const { world, build } = idle({ actorOptions: { collectsItems: true } });
    world.addItem({ id: "gem", name: "gem", position: { x: 4, y: 1 } });

    expect(think(build())).toBe(`${GoalKind.SEEK_ITEM}(gem)`);
    expect(think(build({ random: new FixedRandom(0.9) }))).toBe(GoalKind.WANDER);
  });

  it("walks home when past the leash radius", () => {
    const { build } = idle({
      actorOptions: { spawnPosition: { x: 7, y: 1 } },
      config: { leashRadius: 3 },
    });

    expect(think(build())).toBe(GoalKind.RETURN_TO_SPAWN);
  });

  it("wanders by default and waits when the roll fails", () => {
    const { build } = idle();
    expect(think(build())).toBe(GoalKind.WANDER);

    const context = build({ config: { wanderChance: 0 } });
    think(context);
    expect(kinds(context)).toEqual([GoalKind.BORED]);
  });

  it("runs an idle action a behaviour module offers", () => {
    const { world, build } = idle({
      behaviors: [
        {
          type: BehaviorType.MELEE_ATTACK,
          events: [AIEventName.ON_I_AM_BORED],
          handle: (event) => {
            event.actions.add(event.context.actions.move({ x: 1, y: 0 }), 1, "pace");
          },
        },
      ],
    });
    const context = build();

    think(context);

    expect(world.actionLog).toEqual(["hero move(1,0)"]);
    expect(kinds(context)).toEqual([GoalKind.BORED]);
  });
});
