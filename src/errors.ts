export class OutOfBoundsError extends Error {
    readonly row: number;
    readonly col: number;

    constructor(row: number, col: number, size: number) {
        super(`Coordinates (${col}, ${row}) are outside the ${size}x${size} board.`);
        this.name = 'OutOfBoundsError';
        this.row = row;
        this.col = col;
    }
}

export class SnapshotError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SnapshotError';
    }
}
