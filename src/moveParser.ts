import type {Move} from './gameState.js';

export const MOVE_PROMPT = "Select 'r' for reveal, 'f' to toggle flag, 's' to save, 'q' to quit,\nand enter the column and row of the tile you want.";

/**
 * Reads a line such as `r 3,4`, `f 3 4` or `r34`: an action letter, then the
 * 1-based column and the 1-based row counted from the bottom.
 * Returns undefined when the line is not a valid move on a board of `size`.
 */
export function parseMove(line: string, size: number): Move | undefined {
    const input = line.trim().toLowerCase();
    const action = input.charAt(0);

    if (action === 'q') return { action: 'quit' };
    if (action === 's') return { action: 'save' };
    if (action !== 'r' && action !== 'f') return undefined;

    let numbers = input.slice(1).split(/[,\s]+/).filter((part) => part.length > 0);
    if (numbers.length === 1 && /^\d\d$/.test(numbers[0])) {
        numbers = [numbers[0].charAt(0), numbers[0].charAt(1)];
    }
    if (numbers.length !== 2 || !numbers.every((part) => /^\d+$/.test(part))) return undefined;

    const col = Number(numbers[0]) - 1;
    const row = Number(numbers[1]) - 1;
    if (col < 0 || col >= size || row < 0 || row >= size) return undefined;

    return action === 'r'
        ? { action: 'reveal', coords: {col, row} }
        : { action: 'flag', coords: {col, row} };
}
