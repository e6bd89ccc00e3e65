import { mkdirSync, readdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";

export type TableSource = {
  listFiles: (directory: string) => string[];
  readFile: (directory: string, fileName: string) => Buffer;
};

export type OutputSink = {
  writeFile: (directory: string, fileName: string, contents: string) => string;
};

export const nodeTableSource: TableSource = {
  listFiles: (directory) =>
    readdirSync(directory, { withFileTypes: true })
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name),
  readFile: (directory, fileName) => readFileSync(join(directory, fileName))
};

export const nodeOutputSink: OutputSink = {
  writeFile: (directory, fileName, contents) => {
    mkdirSync(directory, { recursive: true });
    const target = join(directory, fileName);
    writeFileSync(target, contents, "utf8");
    return target;
  }
};
