import {afterEach, beforeEach, describe, it, expect} from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import GameState from '../src/gameState.js';
import {FileSnapshotStore, parseSnapshot} from '../src/saveFile.js';
import {SnapshotError} from '../src/errors.js';
import {TEN_BOMBS, boardWithBombs} from './helpers.js';

describe('parseSnapshot', () => {
    const game = new GameState({ board: boardWithBombs([[4, 4]]), clock: () => 0 });

    it('reads back a saved game', () => {
        game.applyToggleFlag({ col: 0, row: 0 });
        const snapshot = game.toSnapshot();
        expect(parseSnapshot(JSON.stringify(snapshot))).toEqual(snapshot);
    });

    it('rejects text that is not JSON', () => {
        expect(() => parseSnapshot('board: [')).toThrow(SnapshotError);
    });

    it('rejects another save version', () => {
        const raw = JSON.stringify({ ...game.toSnapshot(), version: 2 });
        expect(() => parseSnapshot(raw)).toThrow('Unsupported save version 2.');
    });

    it('rejects a tile without its flags', () => {
        const snapshot = game.toSnapshot();
        const raw = JSON.stringify({ ...snapshot, tiles: [[{ bomb: true }]] });
        expect(() => parseSnapshot(raw)).toThrow('Saved tile is missing bomb, flagged or revealed.');
    });

    it('rejects a board size other than 9', () => {
        const raw = JSON.stringify({ ...game.toSnapshot(), size: 5 });
        expect(() => parseSnapshot(raw)).toThrow('Saved board size 5 is not 9.');
    });

    it('rejects tiles that do not match the saved size', () => {
        const snapshot = game.toSnapshot();
        const raw = JSON.stringify({ ...snapshot, tiles: snapshot.tiles.slice(1) });
        expect(() => parseSnapshot(raw)).toThrow('Saved tiles do not form a 9x9 grid.');
    });

    it('rejects a negative elapsed time', () => {
        const raw = JSON.stringify({ ...game.toSnapshot(), elapsedMs: -1 });
        expect(() => parseSnapshot(raw)).toThrow(SnapshotError);
    });
});

describe('FileSnapshotStore', () => {
    let dir: string;
    let store: FileSnapshotStore;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'minesweeper-'));
        store = new FileSnapshotStore(path.join(dir, 'save.json'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('loads nothing when no game was saved', () => {
        expect(store.load()).toBeUndefined();
    });

    it('saves, loads and removes a game', () => {
        const game = new GameState({ board: boardWithBombs(TEN_BOMBS), clock: () => 0 });
        game.applyReveal({ col: 4, row: 4 });
        const snapshot = game.toSnapshot();

        store.save(snapshot);
        expect(store.load()).toEqual(snapshot);

        const resumed = GameState.fromSnapshot(snapshot);
        expect(resumed.board.toSnapshot()).toEqual(game.board.toSnapshot());

        store.remove();
        expect(fs.existsSync(store.path)).toBe(false);
        expect(() => store.remove()).not.toThrow();
    });

    it('reports a corrupt file', () => {
        fs.writeFileSync(store.path, '{"version": 1');
        expect(() => store.load()).toThrow(SnapshotError);
    });
});
