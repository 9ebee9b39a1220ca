import { createInterface } from 'readline';

export async function promptUser(question: string): Promise<string> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    let answered = false;
    rl.on('close', () => {
      // stdin ended before an answer
      if (!answered) resolve('');
    });
    rl.question(question, (answer) => {
      answered = true;
      rl.close();
      resolve(answer.trim());
    });
  });
}

export async function promptConfirm(question: string, defaultValue: boolean = false): Promise<boolean> {
  const defaultText = defaultValue ? 'Y/n' : 'y/N';
  const answer = await promptUser(`${question} (${defaultText}): `);

  if (answer.length === 0) {
    return defaultValue;
  }

  return answer.toLowerCase().startsWith('y');
}
