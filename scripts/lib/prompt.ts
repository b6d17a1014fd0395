import { createInterface } from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";

import type { AnimalGroups } from "../../src/lib/animals/group.js";
import {
  describeChoices,
  describeRejection,
  isSettled,
  startSelection,
  submitSelection,
} from "../../src/lib/animals/selection.js";

export interface Prompter {
  /** Resolves with trimmed, non-empty text; blank answers are asked again. */
  ask(question: string): Promise<string>;
  say(message: string): void;
  close(): void;
}

export function createConsolePrompter(): Prompter {
  const rl = createInterface({ input, output });
  return {
    async ask(question) {
      while (true) {
        const answer = (await rl.question(`${question}\n> `)).trim();
        if (answer) {
          return answer;
        }
        output.write("Please enter a value.\n");
      }
    },
    say(message) {
      output.write(`${message}\n`);
    },
    close() {
      rl.close();
    },
  };
}

/**
 * Presents the group keys and asks until one of them is typed exactly.
 * Returns `null` without asking when there is nothing to choose from.
 */
export async function chooseGroup(groups: AnimalGroups, prompter: Prompter, label = "group"): Promise<string | null> {
  let state = startSelection(groups.keys());
  if (state.status === "unavailable") {
    return null;
  }

  for (const message of describeChoices(state, label)) {
    prompter.say(message);
  }

  while (!isSettled(state)) {
    state = submitSelection(state, await prompter.ask(`Enter a ${label}:`));
    const rejection = describeRejection(state, label);
    if (rejection) {
      prompter.say(rejection);
    }
  }

  return state.status === "resolved" ? state.key : null;
}
