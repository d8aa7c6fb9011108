import { createInterface } from 'node:readline/promises';

/** Ask a yes/no question on the terminal. Anything but `y` means no. */
export async function promptYesNo(message: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(`${message} y / n [n]: `);
    return answer.trim().toLowerCase() === 'y';
  } finally {
    rl.close();
  }
}
