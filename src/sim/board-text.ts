import { isGoal, isMud, isObstacle, positionKey } from '../kernel/index.js';
import type { EnemyColor, EnemySnapshot, GridModel, Snapshot } from '../kernel/index.js';

const COLOR_SYMBOLS: Readonly<Record<EnemyColor, string>> = {
  red: 'R',
  purple: 'P',
  green: 'G',
};

const enemySymbol = (enemy: EnemySnapshot): string => {
  const symbol = COLOR_SYMBOLS[enemy.color];
  return enemy.lifecycle === 'dormant' ? symbol.toLowerCase() : symbol;
};

/**
 * Text rendering of a snapshot, one line per row with the top row
 * (`y = height - 1`) first. The first enemy in creation order wins a shared cell.
 */
export function renderBoard(grid: GridModel, snapshot: Snapshot): string {
  const enemiesByCell = new Map<string, EnemySnapshot>();
  for (const enemy of snapshot.enemies) {
    const key = positionKey(enemy.position);
    if (!enemiesByCell.has(key)) {
      enemiesByCell.set(key, enemy);
    }
  }

  const playerKey = positionKey(snapshot.player);
  const rows: string[] = [];
  for (let y = grid.height - 1; y >= 0; y -= 1) {
    let row = '';
    for (let x = 0; x < grid.width; x += 1) {
      const position = { x, y };
      const key = positionKey(position);
      const enemy = enemiesByCell.get(key);
      if (key === playerKey) {
        row += enemy === undefined ? '@' : 'X';
      } else if (enemy !== undefined) {
        row += enemySymbol(enemy);
      } else if (isObstacle(grid, position)) {
        row += '#';
      } else if (isMud(grid, position)) {
        row += '~';
      } else if (isGoal(grid, position)) {
        row += '+';
      } else {
        row += '.';
      }
    }
    rows.push(row);
  }
  return rows.join('\n');
}
