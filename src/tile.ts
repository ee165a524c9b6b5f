import type Board from './board.js';

export type Coordinates = {
    readonly x: number;
    readonly y: number;
};

export type TileSnapshot = {
    bomb: boolean;
    flagged: boolean;
    revealed: boolean;
};

const directions = [
    [-1, -1], [-1, 0], [-1, 1],
    [0, -1],         [0, 1],
    [1, -1], [1, 0], [1, 1]
];

export default class Tile {
    readonly coordinates: Coordinates;
    // Non-owning: used for the grid size and neighbor lookup only.
    private readonly board: Board;
    private bomb = false;
    private flagged = false;
    private revealed = false;

    constructor(board: Board, coordinates: Coordinates) {
        this.board = board;
        this.coordinates = coordinates;
    }

    get isBomb(): boolean {
        return this.bomb;
    }

    get isFlagged(): boolean {
        return this.flagged;
    }

    get isRevealed(): boolean {
        return this.revealed;
    }

    setBomb(): void {
        this.bomb = true;
    }

    neighbors(): Tile[] {
        const {x, y} = this.coordinates;
        const neighbors: Tile[] = [];
        for (const [dx, dy] of directions) {
            const nx = x + dx;
            const ny = y + dy;
            if (this.board.contains(ny, nx)) {
                neighbors.push(this.board.tile(ny, nx));
            }
        }
        return neighbors;
    }

    neighborBombCount(): number {
        return this.neighbors().filter((tile) => tile.bomb).length;
    }

    toggleFlag(): void {
        this.flagged = !this.flagged;
    }

    /**
     * Reveals this tile and, while revealed tiles have no bomb around them,
     * keeps revealing their neighbors. Flagged and already revealed tiles
     * stop the cascade, so every tile is visited at most once.
     */
    reveal(): void {
        const pending: Tile[] = [this];
        while (pending.length > 0) {
            const tile = pending.pop();
            if (tile === undefined || tile.revealed || tile.flagged) continue;

            tile.revealed = true;
            if (tile.neighborBombCount() === 0) {
                pending.push(...tile.neighbors());
            }
        }
    }

    toSnapshot(): TileSnapshot {
        return {
            bomb: this.bomb,
            flagged: this.flagged,
            revealed: this.revealed,
        };
    }

    restore(snapshot: TileSnapshot): void {
        this.bomb = snapshot.bomb;
        this.flagged = snapshot.flagged;
        this.revealed = snapshot.revealed;
    }
}
