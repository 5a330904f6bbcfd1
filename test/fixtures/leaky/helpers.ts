import { Block } from "../../../src";

export const square = Block.of((x: number) => x * x);
