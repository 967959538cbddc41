/**
 * Interactive menu over the simple and warehouse scenarios.
 */

import type { ILogger } from '../../src';
import type { Scenario } from '../scenario';
import patternExplanation from './pattern-explanation.json';

/**
 * Line-oriented terminal.
 */
export interface MenuIO {
  /** Show `prompt` and resolve with the next line, or `undefined` at end of input */
  readLine(prompt: string): Promise<string | undefined>;
  writeLine(line: string): void;
}

export interface ConsoleMenuOptions {
  io: MenuIO;
  /** Receives diagnostics, scenario warnings and scenario failures */
  logger: ILogger;
  simpleScenarios: readonly Scenario[];
  warehouseScenarios: readonly Scenario[];
}

export const MAIN_MENU: readonly string[] = [
  '',
  '========================================',
  '  Specification Pattern Demonstrations',
  '========================================',
  '  1. Run all simple examples',
  '  2. Run all warehouse examples',
  '  3. Choose a simple example',
  '  4. Choose a warehouse example',
  '  5. Explain the pattern',
  '  0. Exit',
];

export class ConsoleMenu {
  private readonly io: MenuIO;
  private readonly logger: ILogger;
  private readonly narrator: ILogger;
  private readonly simpleScenarios: readonly Scenario[];
  private readonly warehouseScenarios: readonly Scenario[];

  constructor(options: ConsoleMenuOptions) {
    this.io = options.io;
    this.logger = options.logger;
    this.narrator = this.createNarrator();
    this.simpleScenarios = options.simpleScenarios;
    this.warehouseScenarios = options.warehouseScenarios;
  }

  /**
   * Loop until the user picks `0` or input ends.
   */
  async run(): Promise<void> {
    for (;;) {
      MAIN_MENU.forEach((line) => this.io.writeLine(line));
      const input = await this.io.readLine('Select an option: ');
      if (input === undefined || input.trim() === '0') {
        this.io.writeLine('Goodbye!');
        return;
      }
      await this.handle(input.trim());
    }
  }

  private async handle(choice: string): Promise<void> {
    switch (choice) {
      case '1':
        this.runAll(this.simpleScenarios);
        break;
      case '2':
        this.runAll(this.warehouseScenarios);
        break;
      case '3':
        await this.choose('Simple examples', this.simpleScenarios);
        break;
      case '4':
        await this.choose('Warehouse examples', this.warehouseScenarios);
        break;
      case '5':
        this.explain();
        break;
      default:
        this.io.writeLine(`Invalid choice '${choice}'. Please try again.`);
    }
  }

  private runAll(scenarios: readonly Scenario[]): void {
    scenarios.forEach((scenario) => this.runScenario(scenario));
  }

  private async choose(heading: string, scenarios: readonly Scenario[]): Promise<void> {
    this.io.writeLine(`${heading}:`);
    scenarios.forEach((s) => this.io.writeLine(`  ${s.key}. ${s.title}`));

    const input = await this.io.readLine('Select an example: ');
    if (input === undefined) {
      return;
    }
    const scenario = scenarios.find((s) => s.key === input.trim());
    if (!scenario) {
      this.io.writeLine(`Invalid choice '${input.trim()}'. Please try again.`);
      return;
    }
    this.runScenario(scenario);
  }

  private runScenario(scenario: Scenario): void {
    try {
      scenario.run(this.narrator);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Scenario '${scenario.title}' failed: ${message}`);
    }
  }

  /**
   * Scenario `info` lines are the demo's output, so they go to the terminal
   * whatever the configured level; other levels go to the logger.
   */
  private createNarrator(): ILogger {
    return {
      debug: (message, ...args) => this.logger.debug(message, ...args),
      info: (message, ...args) => this.io.writeLine([message, ...args.map(String)].join(' ')),
      warn: (message, ...args) => this.logger.warn(message, ...args),
      error: (message, ...args) => this.logger.error(message, ...args),
    };
  }

  private explain(): void {
    this.io.writeLine(`=== ${patternExplanation.title} ===`);
    patternExplanation.lines.forEach((line) => this.io.writeLine(line));
  }
}
