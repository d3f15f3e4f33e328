import type { ConfirmDeletion } from "@sandbox-mirror/mirror";
import type { Prompt } from "./prompt.js";

/** Ask before clearing a large area; only "yes" proceeds */
export function confirmDeletion(prompt: Prompt): ConfirmDeletion {
  return async (count) => {
    console.log(`Sandbox has ${count.toLocaleString()} elements at this location.`);
    const answer = await prompt.ask('Proceed with deleting them? (type "yes" if agreed) ');
    return answer.trim().toLowerCase() === "yes";
  };
}
