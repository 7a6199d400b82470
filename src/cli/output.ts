export interface OutputOptions {
  json: boolean;
  color: boolean;
}

export type Tone = 'good' | 'warn' | 'bad';

const TONE_CODES: Record<Tone, string> = {
  good: '32',
  warn: '33',
  bad: '31',
};

export class Output {
  constructor(private options: OutputOptions) {}

  get isJson(): boolean {
    return this.options.json;
  }

  log(message: string): void {
    if (!this.options.json) {
      console.log(message);
    }
  }

  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  error(message: string): void {
    if (this.options.json) {
      this.json({ error: message });
    } else {
      console.error(this.paint('bad', 'Error:') + ` ${message}`);
    }
  }

  list(items: readonly string[], bullet = '-'): void {
    for (const item of items) {
      this.log(`  ${bullet} ${item}`);
    }
  }

  paint(tone: Tone, text: string): string {
    if (!this.options.color) return text;
    return `\x1b[${TONE_CODES[tone]}m${text}\x1b[0m`;
  }
}

export function createOutput(options: Partial<OutputOptions> = {}): Output {
  const defaults: OutputOptions = {
    json: false,
    color: process.stdout.isTTY === true,
  };

  return new Output({ ...defaults, ...options });
}
