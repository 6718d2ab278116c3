import readline from 'node:readline';

/**
 * Ask a yes/no question on the terminal; anything but "y" or "yes" is a no,
 * and so is end of input (Ctrl-D)
 */
export async function confirm(
  message: string,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Promise<boolean> {
  const rl = readline.createInterface({ input, output });

  return new Promise((resolve) => {
    let answered = false;
    rl.on('close', () => {
      if (!answered) {
        resolve(false);
      }
    });
    rl.question(`${message} (y/N) `, (answer) => {
      answered = true;
      rl.close();
      const normalized = answer.trim().toLowerCase();
      resolve(normalized === 'y' || normalized === 'yes');
    });
  });
}
