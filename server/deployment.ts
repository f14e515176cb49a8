import { execFile } from "child_process";
import { promisify } from "util";
import type { ActionResult } from "@shared/schema";

const execFileAsync = promisify(execFile);

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (program: string, args: string[], cwd: string) => Promise<CommandOutput>;

export const execFileRunner: CommandRunner = async (program, args, cwd) => {
  const { stdout, stderr } = await execFileAsync(program, args, { cwd, timeout: 5 * 60 * 1000 });
  return { stdout, stderr };
};

/**
 * Collaborator that updates the deployed application in place.
 */
export interface DeploymentController {
  triggerUpdate(): Promise<ActionResult>;
}

export class ShellDeploymentController implements DeploymentController {
  private running = false;

  constructor(
    private readonly appDir: string,
    private readonly steps: string[][],
    private readonly run: CommandRunner = execFileRunner,
  ) {}

  async triggerUpdate(): Promise<ActionResult> {
    if (this.running) {
      return { success: false, message: "Update already running." };
    }

    this.running = true;
    const output: string[] = [];

    try {
      for (const [program, ...args] of this.steps) {
        if (!program) {
          continue;
        }

        const command = [program, ...args].join(" ");
        console.log(`[UPDATE] Running: ${command}`);

        try {
          const result = await this.run(program, args, this.appDir);
          output.push(result.stdout.trim());
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          console.error(`[UPDATE] ${command} failed:`, reason);
          return { success: false, message: `Update failed at "${command}": ${reason}` };
        }
      }

      const details = output.filter(Boolean).join("\n");
      return {
        success: true,
        message: details ? `Update completed.\n${details}` : "Update completed.",
      };
    } finally {
      this.running = false;
    }
  }
}
