import type { Orchestrator } from './agent/orchestrator.js';
import type { SignupDatabase } from './tools/db.js';
import { handleCommand } from './commands.js';
import { errorMessage } from './errors.js';

export const GOODBYE = '\n\n👋 Goodbye!';

export interface SessionOptions {
  orchestrator: Pick<Orchestrator, 'execute' | 'resetMemory'>;
  database: Pick<SignupDatabase, 'getSchema' | 'getSampleRows' | 'close'>;
  /** Shows the input prompt before each line is read. */
  prompt: () => void;
  /** Stops the input stream, ending `run` once the current line is done. */
  endInput: () => void;
  exit: (code: number) => void;
}

/**
 * The interactive loop: one line in, one command result or answer out.
 *
 * Lines are consumed from an async iterable, so input that arrives while a
 * turn is running is queued rather than lost.
 */
export class Session {
  private turnInFlight = false;

  constructor(private readonly options: SessionOptions) {}

  isTurnInFlight(): boolean {
    return this.turnInFlight;
  }

  async run(lines: AsyncIterable<string>): Promise<void> {
    this.options.prompt();

    for await (const line of lines) {
      const input = line.trim();
      if (input && (await this.handleLine(input))) {
        await this.options.database.close();
        return;
      }
      this.options.prompt();
    }

    console.log(GOODBYE);
    await this.options.database.close();
  }

  /**
   * Ctrl-C. Between turns it ends input and `run` says goodbye; during a turn
   * nothing would read the closed input, so the process exits here.
   */
  async interrupt(): Promise<void> {
    if (!this.turnInFlight) {
      this.options.endInput();
      return;
    }

    console.log(GOODBYE);
    await this.options.database.close();
    this.options.exit(0);
  }

  // Returns true when the session should end
  private async handleLine(input: string): Promise<boolean> {
    const { orchestrator, database } = this.options;
    this.turnInFlight = true;

    try {
      const command = await handleCommand(input, { orchestrator, database });
      if (command.handled) {
        console.log(command.output);
        return command.exit;
      }

      const { answer } = await orchestrator.execute(input);
      console.log(`\n🤖 Agent: ${answer}`);
    } catch (error) {
      console.error(`\n❌ Error: ${errorMessage(error)}`);
      console.error("Please try again or type 'schema' to see database structure.");
    } finally {
      this.turnInFlight = false;
    }

    return false;
  }
}
