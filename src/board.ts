import Tile, {type TileSnapshot} from './tile.js';
import {BOARD_SIZE, MINE_COUNT} from './config.js';
import {mathRandom, type RandomSource} from './randomSource.js';
import {SnapshotError} from './errors.js';

export type BoardSnapshot = TileSnapshot[][];

export type BoardOptions = {
    random?: RandomSource;
    mineCount?: number;
};

export default class Board {
    readonly size: number = BOARD_SIZE;
    private readonly cells: Tile[][];

    constructor(options: BoardOptions = {}) {
        const mineCount = options.mineCount ?? MINE_COUNT;
        if (mineCount < 0) {
            throw new Error("Mine count cannot be negative.");
        }
        if (mineCount > this.size * this.size) {
            throw new Error("Too many mines for the board size.");
        }

        this.cells = Array.from({ length: this.size }, (_, y) =>
            Array.from({ length: this.size }, (_, x) => new Tile(this, {x, y}))
        );

        this.seedBombs(options.random ?? mathRandom, mineCount);
    }

    static fromSnapshot(snapshot: BoardSnapshot): Board {
        const board = new Board({ mineCount: 0 });

        if (snapshot.length !== board.size || snapshot.some((row) => row.length !== board.size)) {
            throw new SnapshotError(`Saved board is not ${board.size}x${board.size}.`);
        }

        snapshot.forEach((row, y) => {
            row.forEach((tile, x) => {
                if (tile.flagged && tile.revealed) {
                    throw new SnapshotError(`Saved tile (${x}, ${y}) is both flagged and revealed.`);
                }
                if (tile.bomb && tile.revealed) {
                    throw new SnapshotError(`Saved tile (${x}, ${y}) is a revealed bomb.`);
                }
                board.cells[y][x].restore(tile);
            });
        });

        if (board.mineCount !== MINE_COUNT) {
            throw new SnapshotError(`Saved board has ${board.mineCount} mines instead of ${MINE_COUNT}.`);
        }

        return board;
    }

    get mineCount(): number {
        return this.tiles().filter((tile) => tile.isBomb).length;
    }

    contains(row: number, col: number): boolean {
        return Number.isInteger(row) && Number.isInteger(col)
            && row >= 0 && row < this.size && col >= 0 && col < this.size;
    }

    row(index: number): readonly Tile[] {
        return this.cells[index];
    }

    tile(row: number, col: number): Tile {
        return this.cells[row][col];
    }

    tiles(): Tile[] {
        return this.cells.flat();
    }

    won(): boolean {
        return this.cells.every((row) => row.every((tile) => tile.isBomb || tile.isRevealed));
    }

    toSnapshot(): BoardSnapshot {
        return this.cells.map((row) => row.map((tile) => tile.toSnapshot()));
    }

    private seedBombs(random: RandomSource, mineCount: number): void {
        let placedMines = 0;

        while (placedMines < mineCount) {
            const y = random.nextInt(this.size);
            const x = random.nextInt(this.size);

            const tile = this.cells[y][x];
            if (!tile.isBomb) {
                tile.setBomb();
                placedMines++;
            }
        }
    }
}
