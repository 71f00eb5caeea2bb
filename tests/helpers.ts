import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import path from "path";

/** Temporary project root with helpers to drop tables into it. */
export function tempRoot() {
  const root = mkdtempSync(path.join(tmpdir(), "drop-odds-"));
  const writeText = (relative: string, text: string) => {
    const file = path.join(root, relative);
    mkdirSync(path.dirname(file), { recursive: true });
    writeFileSync(file, text, "utf-8");
    return file;
  };
  return {
    root,
    writeText,
    write(relative: string, data: unknown) {
      return writeText(relative, JSON.stringify(data));
    },
    read(relative: string) {
      return readFileSync(path.join(root, relative), "utf-8");
    },
    dispose() {
      rmSync(root, { recursive: true, force: true });
    },
  };
}

export type TempRoot = ReturnType<typeof tempRoot>;
