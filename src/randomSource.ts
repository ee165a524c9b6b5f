export type RandomSource = {
    /** Integer in `[0, maxExclusive)`. */
    nextInt(maxExclusive: number): number;
};

export const mathRandom: RandomSource = {
    nextInt: (maxExclusive: number) => Math.floor(Math.random() * maxExclusive),
};
