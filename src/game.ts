import GameState, {GameStatus, type Move, type SnapshotStore} from './gameState.js';
import {MOVE_PROMPT, parseMove} from './moveParser.js';
import {GREEN, RED, YELLOW, paint, render} from './renderer.js';
import {SnapshotError} from './errors.js';

/** Resolves with undefined once input has ended. */
export type Ask = (question: string) => Promise<string | undefined>;

export type RunOptions = {
    ask: Ask;
    store: SnapshotStore;
    game?: GameState;
    colors?: boolean;
};

/** Resumes the saved game when there is one, otherwise starts a new board. */
export function loadGame(store: SnapshotStore): GameState {
    try {
        const snapshot = store.load();
        return snapshot ? GameState.fromSnapshot(snapshot, { store }) : new GameState({ store });
    } catch (error) {
        if (error instanceof SnapshotError) {
            console.error(`Could not resume saved game, starting a new one. ${error.message}`);
            return new GameState({ store });
        }
        throw error;
    }
}

async function readMove(ask: Ask, size: number): Promise<Move> {
    for (;;) {
        const line = await ask(`${MOVE_PROMPT}\n> `);
        if (line === undefined) return { action: 'quit' };

        const move = parseMove(line, size);
        if (move !== undefined) return move;
    }
}

export async function run(options: RunOptions): Promise<GameState> {
    const {ask, store} = options;
    const renderOptions = { colors: options.colors };
    const game = options.game ?? loadGame(store);

    while (!game.isOver) {
        console.log(render(game, renderOptions));

        const move = await readMove(ask, game.board.size);
        if (move.action === 'save') {
            store.save(game.toSnapshot());
            console.log(paint('Game saved.', GREEN, renderOptions));
            const answer = await ask('Do you want to quit? Y/N\n> ');
            if (answer === undefined || answer.trim().toLowerCase() === 'y') game.applyQuit();
            continue;
        }

        game.apply(move);
    }

    switch (game.status) {
        case GameStatus.Exploded:
            console.log(render(game, renderOptions));
            console.log(paint('Hooray! You exploded with excitement! But you lost.', GREEN, renderOptions));
            break;
        case GameStatus.Won:
            console.log(render(game, renderOptions));
            console.log(paint('You managed to avoid being scattered across the game board. Congrats.', YELLOW, renderOptions));
            break;
        default:
            console.log(paint('Quitter.', RED, renderOptions));
    }

    return game;
}
