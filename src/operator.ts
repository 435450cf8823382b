import fs from "node:fs";
import path from "node:path";
import { Writable } from "node:stream";
import { createInterface } from "node:readline/promises";

/** The human at the keyboard: answers credential prompts and transcribes captchas. */
export interface Operator {
  /** Resolves to `previous` when the operator just presses enter. */
  askUsername(previous?: string): Promise<string>;
  askPassword(username: string): Promise<string>;
  solveCaptcha(image: Buffer): Promise<string>;
}

export interface ConsoleOperatorOptions {
  captchaPath: string;
  defaultUsername?: string;
  /** Used for the first prompt only; a rejected password is always asked for again. */
  initialPassword?: string;
}

export class ConsoleOperator implements Operator {
  private pendingPassword: string | undefined;

  constructor(private readonly options: ConsoleOperatorOptions) {
    this.pendingPassword = options.initialPassword;
  }

  async askUsername(last?: string): Promise<string> {
    const previous = last ?? this.options.defaultUsername;
    const hint = previous ? ` (${previous})` : "";
    while (true) {
      const answer = (await ask(`Enter username${hint}: `)).trim();
      if (answer) return answer;
      if (previous) {
        console.log(`Using username: ${previous}`);
        return previous;
      }
    }
  }

  async askPassword(username: string): Promise<string> {
    if (this.pendingPassword) {
      const password = this.pendingPassword;
      this.pendingPassword = undefined;
      return password;
    }
    return ask(`Enter password for ${username}: `, { muted: true });
  }

  async solveCaptcha(image: Buffer): Promise<string> {
    const target = this.options.captchaPath;
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, image);
    console.log(`🧩 Captcha image written to ${target}`);
    return (await ask("Enter captcha: ")).trim();
  }
}

async function ask(question: string, { muted = false }: { muted?: boolean } = {}): Promise<string> {
  let silenced = false;
  const output = new Writable({
    write(chunk, _encoding, callback) {
      if (!silenced) process.stdout.write(chunk);
      callback();
    }
  });

  const rl = createInterface({ input: process.stdin, output, terminal: true });
  try {
    const pending = rl.question(question);
    silenced = muted;
    const answer = await pending;
    if (muted) process.stdout.write("\n");
    return answer;
  } finally {
    rl.close();
  }
}
