import * as readline from "readline";
import { Writable } from "stream";

/**
 * Prompt the user interactively via stdin. The question goes to stderr so
 * stdout stays reserved for the report. With `hidden`, typed characters
 * are not echoed.
 */
export function prompt(question: string, hidden = false): Promise<string> {
  let muted = false;
  const output = new Writable({
    write(chunk, encoding, callback) {
      if (!muted) process.stderr.write(chunk, encoding);
      callback();
    },
  });

  const rl = readline.createInterface({
    input: process.stdin,
    output,
    terminal: true,
  });

  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      if (hidden) process.stderr.write("\n");
      resolve(hidden ? answer : answer.trim());
    });
    muted = hidden;
  });
}

export function canPrompt(): boolean {
  return Boolean(process.stdin.isTTY);
}
