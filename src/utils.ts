import os from "node:os";
import path from "node:path";

export function resolveUserPath(input: string): string {
  const trimmed = input.trim();
  if (trimmed === "~") {
    return os.homedir();
  }
  if (trimmed.startsWith("~/")) {
    return path.join(os.homedir(), trimmed.slice(2));
  }
  return path.resolve(trimmed);
}

export function shortenHomePath(input: string): string {
  const home = os.homedir();
  if (input === home) {
    return "~";
  }
  if (input.startsWith(`${home}${path.sep}`)) {
    return `~${input.slice(home.length)}`;
  }
  return input;
}
