import { mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname } from "path";
import { InputError, errorMessage } from "../errors/index.js";

export function readText(path: string): string {
  try {
    return readFileSync(path, "utf8");
  } catch (err) {
    throw new InputError(`cannot read ${path}: ${errorMessage(err)}`, path, "read");
  }
}

export function writeText(path: string, content: string): void {
  try {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content, "utf8");
  } catch (err) {
    throw new InputError(`cannot write ${path}: ${errorMessage(err)}`, path, "write");
  }
}
