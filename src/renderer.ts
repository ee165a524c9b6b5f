import type Tile from './tile.js';
import type GameState from './gameState.js';
import {GameStatus} from './gameState.js';

export const RESET = '\x1b[0m';
export const RED = '\x1b[31m';
export const GREEN = '\x1b[32m';
export const YELLOW = '\x1b[33m';
export const BLUE = '\x1b[34m';

export type DisplayCategory =
    | { kind: 'flag' }
    | { kind: 'hidden' }
    | { kind: 'blank' }
    | { kind: 'count'; count: number }
    | { kind: 'bomb'; detonated: boolean };

export type RenderOptions = {
    colors?: boolean;
};

export function displayCategory(tile: Tile, game?: GameState): DisplayCategory {
    if (game?.status === GameStatus.Exploded && tile.isBomb) {
        return { kind: 'bomb', detonated: game.detonatedTile === tile };
    }
    if (tile.isFlagged) return { kind: 'flag' };
    if (!tile.isRevealed) return { kind: 'hidden' };

    const count = tile.neighborBombCount();
    return count === 0 ? { kind: 'blank' } : { kind: 'count', count };
}

export function countColor(count: number): string {
    switch (count) {
        case 1:
            return BLUE;
        case 2:
            return GREEN;
        case 3:
        case 4:
        case 5:
        case 6:
        case 7:
        case 8:
            return RED;
        default:
            return RED;
    }
}

export function paint(text: string, color: string, options: RenderOptions = {}): string {
    return options.colors === false ? text : `${color}${text}${RESET}`;
}

export function tileSymbol(category: DisplayCategory, options: RenderOptions = {}): string {
    switch (category.kind) {
        case 'flag':
            return paint('F', YELLOW, options);
        case 'hidden':
            return '*';
        case 'blank':
            return '_';
        case 'count':
            return paint(String(category.count), countColor(category.count), options);
        case 'bomb':
            return category.detonated ? paint('X', RED, options) : 'X';
    }
}

export function renderBoard(game: GameState, options: RenderOptions = {}): string[] {
    const rows: string[] = [];
    for (let y = 0; y < game.board.size; y++) {
        rows.push(game.board.row(y).map((tile) => tileSymbol(displayCategory(tile, game), options)).join(' '));
    }
    return rows;
}

export function renderElapsed(elapsedMs: number, options: RenderOptions = {}): string {
    return paint(`${(elapsedMs / 1000).toFixed(1)} seconds elapsed`, GREEN, options);
}

export function render(game: GameState, options: RenderOptions = {}): string {
    return [...renderBoard(game, options), '', renderElapsed(game.elapsedMs(), options)].join('\n');
}
