import type { Direction, DirectionName, GridModel, GridPosition, LevelConfig } from './types.js';

export const DIRECTIONS = {
  up: { dx: 0, dy: 1 },
  down: { dx: 0, dy: -1 },
  left: { dx: -1, dy: 0 },
  right: { dx: 1, dy: 0 },
  upLeft: { dx: -1, dy: 1 },
  upRight: { dx: 1, dy: 1 },
  downLeft: { dx: -1, dy: -1 },
  downRight: { dx: 1, dy: -1 },
} as const satisfies Readonly<Record<DirectionName, Direction>>;

// Scan order for enemy pathfinding. Earlier entries win ties.
export const CARDINAL_DIRECTIONS: readonly Direction[] = [
  DIRECTIONS.up,
  DIRECTIONS.down,
  DIRECTIONS.left,
  DIRECTIONS.right,
];

export const positionKey = (position: GridPosition): string => `${position.x},${position.y}`;

export const samePosition = (left: GridPosition, right: GridPosition): boolean =>
  left.x === right.x && left.y === right.y;

export const translate = (position: GridPosition, direction: Direction): GridPosition => ({
  x: position.x + direction.dx,
  y: position.y + direction.dy,
});

export const manhattanDistance = (left: GridPosition, right: GridPosition): number =>
  Math.abs(left.x - right.x) + Math.abs(left.y - right.y);

/** King-move neighbourhood: the 8 surrounding cells, never the cell itself. */
export const isChebyshevAdjacent = (left: GridPosition, right: GridPosition): boolean => {
  const dx = Math.abs(left.x - right.x);
  const dy = Math.abs(left.y - right.y);
  return dx <= 1 && dy <= 1 && !(dx === 0 && dy === 0);
};

export const isUnitDirection = (direction: Direction): boolean => {
  const components: readonly number[] = [direction.dx, direction.dy];
  if (!components.every((component) => component === -1 || component === 0 || component === 1)) {
    return false;
  }
  return !(direction.dx === 0 && direction.dy === 0);
};

export function createGridModel(config: LevelConfig): GridModel {
  return {
    width: config.width,
    height: config.height,
    goal: { x: config.goal.x, y: config.goal.y },
    obstacles: new Set(config.obstacles.map(positionKey)),
    mud: new Set(config.mud.map(positionKey)),
  };
}

export const inBounds = (grid: GridModel, position: GridPosition): boolean =>
  Number.isInteger(position.x)
  && Number.isInteger(position.y)
  && position.x >= 0
  && position.x < grid.width
  && position.y >= 0
  && position.y < grid.height;

export const isObstacle = (grid: GridModel, position: GridPosition): boolean =>
  grid.obstacles.has(positionKey(position));

export const isMud = (grid: GridModel, position: GridPosition): boolean => grid.mud.has(positionKey(position));

export const isGoal = (grid: GridModel, position: GridPosition): boolean => samePosition(grid.goal, position);
