import * as fs from 'node:fs';

// One level up from both src/ and dist/
const ASSETS_DIRECTORY = new URL('../assets/', import.meta.url);

export const readAsset = (filename: string) =>
    fs.readFileSync(new URL(filename, ASSETS_DIRECTORY));
