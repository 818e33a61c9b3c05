/** Anything that can ask a question and return the typed line, e.g. readline/promises. */
export interface LineSource {
  question(query: string): Promise<string>;
}

export type Print = (line: string) => void;

const YES = new Set(["y", "yes", "true", "1"]);
const NO = new Set(["n", "no", "false", "0"]);

/**
 * Re-asking prompts for strings, yes/no answers and bounded integers.
 */
export class Prompter {
  constructor(
    private readonly source: LineSource,
    readonly print: Print,
  ) {}

  async ask(query: string): Promise<string> {
    return (await this.source.question(query)).trim();
  }

  async text(message: string, defaultValue?: string, allowEmpty = false): Promise<string> {
    const hint = defaultValue !== undefined ? ` [${defaultValue}]` : "";
    while (true) {
      const value = await this.ask(`${message}${hint}: `);
      if (value) {
        return value;
      }
      if (defaultValue !== undefined) {
        return defaultValue;
      }
      if (allowEmpty) {
        return "";
      }
      this.print("Please enter a value.");
    }
  }

  async confirm(message: string, defaultValue = true): Promise<boolean> {
    const hint = defaultValue ? "Y/n" : "y/N";
    while (true) {
      const value = (await this.ask(`${message} (${hint}): `)).toLowerCase();
      if (!value) {
        return defaultValue;
      }
      if (YES.has(value)) {
        return true;
      }
      if (NO.has(value)) {
        return false;
      }
      this.print("Please answer y or n.");
    }
  }

  async integer(
    message: string,
    defaultValue?: number,
    min?: number,
    max?: number,
  ): Promise<number> {
    const hint = defaultValue !== undefined ? ` [${defaultValue}]` : "";
    while (true) {
      const value = await this.ask(`${message}${hint}: `);
      if (!value && defaultValue !== undefined) {
        return defaultValue;
      }
      if (!/^[+-]?\d+$/.test(value)) {
        this.print("Please enter a number.");
        continue;
      }
      const parsed = Number(value);
      if (min !== undefined && parsed < min) {
        this.print(`Must be >= ${min}`);
        continue;
      }
      if (max !== undefined && parsed > max) {
        this.print(`Must be <= ${max}`);
        continue;
      }
      return parsed;
    }
  }
}
