import Board from '../src/board.js';
import type {GameSnapshot, SnapshotStore} from '../src/gameState.js';
import type {RandomSource} from '../src/randomSource.js';

export function sequenceRandom(values: number[]): RandomSource {
    let index = 0;
    return {
        nextInt: (maxExclusive: number) => {
            if (index >= values.length) throw new Error('Random sequence exhausted.');
            const value = values[index++];
            if (value >= maxExclusive) throw new Error(`${value} is not below ${maxExclusive}.`);
            return value;
        },
    };
}

// A full-size layout, as a saved game must hold.
export const TEN_BOMBS: [number, number][] = [
    [0, 0], [0, 8], [2, 3], [3, 3], [4, 7],
    [5, 1], [6, 6], [7, 2], [8, 0], [8, 8],
];

/** Board with bombs exactly at the given [row, col] positions. */
export function boardWithBombs(bombs: [number, number][]): Board {
    return new Board({
        mineCount: bombs.length,
        random: sequenceRandom(bombs.flat()),
    });
}

export function revealedCount(board: Board): number {
    return board.tiles().filter((tile) => tile.isRevealed).length;
}

export class MemorySnapshotStore implements SnapshotStore {
    snapshot: GameSnapshot | undefined;

    constructor(snapshot?: GameSnapshot) {
        this.snapshot = snapshot;
    }

    load(): GameSnapshot | undefined {
        return this.snapshot;
    }

    save(snapshot: GameSnapshot): void {
        this.snapshot = snapshot;
    }

    remove(): void {
        this.snapshot = undefined;
    }
}
