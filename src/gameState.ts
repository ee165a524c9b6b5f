import Board, {type BoardOptions, type BoardSnapshot} from './board.js';
import {OutOfBoundsError, SnapshotError} from './errors.js';
import type Tile from './tile.js';

export enum GameStatus {
    Ongoing = 'ongoing',
    Exploded = 'exploded',
    Won = 'won',
    Quit = 'quit',
}

/** 0-based column, and row counted from the bottom of the rendered grid. */
export type MoveCoordinates = {
    col: number;
    row: number;
};

export type Move =
    | { action: 'reveal'; coords: MoveCoordinates }
    | { action: 'flag'; coords: MoveCoordinates }
    | { action: 'save' }
    | { action: 'quit' };

export type GameSnapshot = {
    version: 1;
    size: number;
    elapsedMs: number;
    tiles: BoardSnapshot;
};

/** Where a saved game lives; only removal is needed by the game itself. */
export interface SnapshotStore {
    load(): GameSnapshot | undefined;
    save(snapshot: GameSnapshot): void;
    remove(): void;
}

export type GameStateOptions = {
    board?: Board;
    boardOptions?: BoardOptions;
    store?: SnapshotStore;
    clock?: () => number;
    elapsedMs?: number;
};

export default class GameState {
    readonly board: Board;
    private currentStatus: GameStatus = GameStatus.Ongoing;
    private detonated: Tile | undefined;
    private readonly store: SnapshotStore | undefined;
    private readonly clock: () => number;
    private readonly startTime: number;
    private readonly elapsedAccumulator: number;

    constructor(options: GameStateOptions = {}) {
        this.board = options.board ?? new Board(options.boardOptions);
        this.store = options.store;
        this.clock = options.clock ?? Date.now;
        this.startTime = this.clock();
        this.elapsedAccumulator = options.elapsedMs ?? 0;
    }

    static fromSnapshot(snapshot: GameSnapshot, options: Omit<GameStateOptions, 'board' | 'boardOptions' | 'elapsedMs'> = {}): GameState {
        const board = Board.fromSnapshot(snapshot.tiles);
        if (board.won()) {
            throw new SnapshotError('Saved game is already won.');
        }

        return new GameState({
            ...options,
            board,
            elapsedMs: snapshot.elapsedMs,
        });
    }

    get status(): GameStatus {
        return this.currentStatus;
    }

    get isOver(): boolean {
        return this.currentStatus !== GameStatus.Ongoing;
    }

    /** The bomb that ended the game, if one did. */
    get detonatedTile(): Tile | undefined {
        return this.detonated;
    }

    elapsedMs(): number {
        return this.elapsedAccumulator + (this.clock() - this.startTime);
    }

    apply(move: Move): void {
        switch (move.action) {
            case 'reveal':
                this.applyReveal(move.coords);
                break;
            case 'flag':
                this.applyToggleFlag(move.coords);
                break;
            case 'quit':
                this.applyQuit();
                break;
            case 'save':
                break;
        }
    }

    applyReveal(coords: MoveCoordinates): void {
        const tile = this.tileAt(coords);
        if (this.isOver || tile.isFlagged || tile.isRevealed) return;

        if (tile.isBomb) {
            this.detonated = tile;
            this.finish(GameStatus.Exploded);
            return;
        }

        tile.reveal();
        if (this.board.won()) {
            this.finish(GameStatus.Won);
        }
    }

    applyToggleFlag(coords: MoveCoordinates): void {
        const tile = this.tileAt(coords);
        if (this.isOver || tile.isRevealed) return;

        tile.toggleFlag();
    }

    applyQuit(): void {
        if (this.isOver) return;

        this.currentStatus = GameStatus.Quit;
    }

    toSnapshot(): GameSnapshot {
        return {
            version: 1,
            size: this.board.size,
            elapsedMs: this.elapsedMs(),
            tiles: this.board.toSnapshot(),
        };
    }

    private tileAt({col, row}: MoveCoordinates): Tile {
        const boardRow = this.board.size - 1 - row;
        if (!this.board.contains(boardRow, col)) {
            throw new OutOfBoundsError(row, col, this.board.size);
        }
        return this.board.tile(boardRow, col);
    }

    private finish(status: GameStatus.Exploded | GameStatus.Won): void {
        this.currentStatus = status;
        this.store?.remove();
    }
}
