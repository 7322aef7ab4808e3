import { createInterface } from 'node:readline/promises';

/**
 * Ask once on the terminal for the one-time sign-in passcode
 */
export async function promptPasscode(
  question = 'Enter your source MFA passcode (leave blank to skip): '
): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout, terminal: true });
  try {
    return (await rl.question(question)).trim();
  } finally {
    rl.close();
  }
}
