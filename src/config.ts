export const BOARD_SIZE = 9;
export const MINE_COUNT = 10;

export const SAVE_FILE: string = process.env.MINESWEEPER_SAVE_FILE ?? 'minesweeper_save.json';
