import {fileURLToPath} from "node:url";

/**
 * test/fixtures 配下のファイルの絶対パス
 */
export function fixturePath(name: string): string {
    return fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));
}
