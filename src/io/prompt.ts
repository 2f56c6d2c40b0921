import readline from "readline";

export type ConfirmFn = (question: string) => Promise<boolean>;

export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === "y" || normalized === "yes";
}

export function ask(
  query: string,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Promise<string> {
  const rl = readline.createInterface({ input, output });
  return new Promise((resolve) => {
    // Closed input (EOF, piped stdin) counts as an empty answer.
    rl.once("close", () => resolve(""));
    rl.question(query, (answer) => {
      resolve(answer);
      rl.close();
    });
  });
}

/** Yes/no prompt; anything but y/yes, including an empty line, declines. */
export async function confirm(question: string): Promise<boolean> {
  return isAffirmative(await ask(question));
}
