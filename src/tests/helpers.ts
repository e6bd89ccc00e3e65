import type { OutputSink, TableSource } from "../lib/io/fileSystem";

export const memorySource = (files: Record<string, string | Buffer>): TableSource => ({
  listFiles: () => Object.keys(files),
  readFile: (_directory, fileName) => {
    const contents = files[fileName];
    if (contents === undefined) {
      throw new Error(`No such file: ${fileName}`);
    }
    return typeof contents === "string" ? Buffer.from(contents, "utf8") : contents;
  }
});

export const memorySink = () => {
  const written = new Map<string, string>();
  const sink: OutputSink = {
    writeFile: (directory, fileName, contents) => {
      const target = `${directory}/${fileName}`;
      written.set(target, contents);
      return target;
    }
  };
  return { sink, written };
};

export const captureError = (action: () => unknown): unknown => {
  try {
    action();
  } catch (error) {
    return error;
  }
  throw new Error("Expected the action to throw.");
};
