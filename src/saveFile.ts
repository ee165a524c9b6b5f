import fs from 'fs';
import type {BoardSnapshot} from './board.js';
import type {GameSnapshot, SnapshotStore} from './gameState.js';
import type {TileSnapshot} from './tile.js';
import {SnapshotError} from './errors.js';
import {BOARD_SIZE} from './config.js';

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

function parseTile(value: unknown): TileSnapshot {
    if (!isRecord(value)) throw new SnapshotError('Saved tile is not an object.');

    const {bomb, flagged, revealed} = value;
    if (typeof bomb !== 'boolean' || typeof flagged !== 'boolean' || typeof revealed !== 'boolean') {
        throw new SnapshotError('Saved tile is missing bomb, flagged or revealed.');
    }
    return { bomb, flagged, revealed };
}

function parseTiles(value: unknown): BoardSnapshot {
    if (!Array.isArray(value)) throw new SnapshotError('Saved board has no tiles.');

    return value.map((row: unknown) => {
        if (!Array.isArray(row)) throw new SnapshotError('Saved board row is not a list.');
        return row.map((tile: unknown) => parseTile(tile));
    });
}

export function parseSnapshot(raw: string): GameSnapshot {
    let data: unknown;
    try {
        data = JSON.parse(raw);
    } catch (error) {
        throw new SnapshotError(`Save file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (!isRecord(data)) throw new SnapshotError('Save file does not hold a game.');

    const {version, size, elapsedMs, tiles} = data;
    if (version !== 1) throw new SnapshotError(`Unsupported save version ${String(version)}.`);
    if (typeof size !== 'number' || !Number.isInteger(size)) throw new SnapshotError('Saved board size is missing.');
    if (size !== BOARD_SIZE) throw new SnapshotError(`Saved board size ${size} is not ${BOARD_SIZE}.`);
    if (typeof elapsedMs !== 'number' || !Number.isFinite(elapsedMs) || elapsedMs < 0) {
        throw new SnapshotError('Saved elapsed time is missing.');
    }

    const rows = parseTiles(tiles);
    if (rows.length !== size || rows.some((row) => row.length !== size)) {
        throw new SnapshotError(`Saved tiles do not form a ${size}x${size} grid.`);
    }

    return { version: 1, size, elapsedMs, tiles: rows };
}

export class FileSnapshotStore implements SnapshotStore {
    readonly path: string;

    constructor(path: string) {
        this.path = path;
    }

    load(): GameSnapshot | undefined {
        if (!fs.existsSync(this.path)) return undefined;
        return parseSnapshot(fs.readFileSync(this.path, 'utf8'));
    }

    save(snapshot: GameSnapshot): void {
        fs.writeFileSync(this.path, JSON.stringify(snapshot));
    }

    remove(): void {
        fs.rmSync(this.path, { force: true });
    }
}
