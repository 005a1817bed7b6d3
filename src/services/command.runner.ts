import { spawn } from 'child_process';
import { TimeoutError, ToolFailureError } from '../errors/index.js';

export interface CommandOptions {
    /** Working directory of the child process */
    cwd?: string;
    /** Bytes written to stdin, which is then closed */
    input?: Buffer;
    /** Kill the process after this many ms */
    timeoutMs?: number;
}

export interface CommandResult {
    exitCode: number;
    stdout: Buffer;
    stderr: string;
}

/**
 * Runs external binaries; swapped for a fake in tests
 */
export interface ICommandRunner {
    run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult>;
}

/**
 * Child-process runner
 *
 * Resolves with the exit code rather than rejecting on non-zero exit, so callers
 * decide what a failure means for their tool. Rejects with ToolFailureError when the
 * binary cannot be started and TimeoutError when it outlives `timeoutMs`.
 */
export class SpawnCommandRunner implements ICommandRunner {
    run(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
        return new Promise((resolve, reject) => {
            const child = spawn(command, args, {
                cwd: options.cwd,
                stdio: ['pipe', 'pipe', 'pipe'],
            });

            const stdout: Buffer[] = [];
            const stderr: Buffer[] = [];
            let settled = false;
            let timer: NodeJS.Timeout | undefined;

            const finish = (outcome: () => void): void => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                outcome();
            };

            if (options.timeoutMs !== undefined) {
                const timeoutMs = options.timeoutMs;
                timer = setTimeout(() => {
                    child.kill('SIGKILL');
                    finish(() => reject(new TimeoutError(command, timeoutMs)));
                }, timeoutMs);
            }

            child.stdout.on('data', (data: Buffer) => stdout.push(data));
            child.stderr.on('data', (data: Buffer) => stderr.push(data));

            child.on('error', (error: Error) => {
                finish(() => reject(new ToolFailureError(`Failed to start ${command}: ${error.message}`, command)));
            });

            child.on('close', (code: number | null) => {
                finish(() => resolve({
                    exitCode: code ?? -1,
                    stdout: Buffer.concat(stdout),
                    stderr: Buffer.concat(stderr).toString('utf8'),
                }));
            });

            // A tool that exits before reading stdin raises EPIPE; the exit code reports the real failure
            child.stdin.on('error', () => undefined);
            if (options.input) {
                child.stdin.end(options.input);
            } else {
                child.stdin.end();
            }
        });
    }
}
