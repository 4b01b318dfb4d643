/**
 * Yes/no confirmation on the terminal.
 */

import { createInterface } from "node:readline";

export type Confirm = (message: string) => Promise<boolean>;

export function isAffirmative(answer: string): boolean {
  const value = answer.trim().toLowerCase();
  return value === "y" || value === "yes";
}

/**
 * Ask on stdin/stdout. Anything but "y" or "yes" declines.
 */
export const confirmOnTerminal: Confirm = (message) => {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((resolve) => {
    rl.question(`${message} (y/N) `, (answer) => {
      rl.close();
      resolve(isAffirmative(answer));
    });
  });
};
