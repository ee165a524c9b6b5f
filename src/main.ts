#!/usr/bin/env node
import readline from 'readline/promises';
import {FileSnapshotStore} from './saveFile.js';
import {SAVE_FILE} from './config.js';
import {run} from './game.js';

const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
});

let inputClosed = false;
const closed = new Promise<undefined>((resolve) => {
    rl.once('close', () => {
        inputClosed = true;
        resolve(undefined);
    });
});

const ask = (question: string): Promise<string | undefined> => {
    if (inputClosed) return Promise.resolve(undefined);

    const answer = rl.question(question).catch((error: unknown) => {
        if (inputClosed) return undefined;
        throw error;
    });
    return Promise.race([answer, closed]);
};

run({
    ask,
    store: new FileSnapshotStore(SAVE_FILE),
}).catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
}).finally(() => rl.close());
