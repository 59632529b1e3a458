// Path: src/utils/shell.ts
// Shell execution for user-supplied password commands

import { execSync } from 'node:child_process';

/**
 * Run a user-configured shell command and return its standard output.
 *
 * The command string comes from the user's own environment, so it is
 * handed to the shell as-is (pipes and quoting are expected to work).
 * stdin is inherited so commands such as `pass` or `gpg` can ask for
 * their own credentials.
 *
 * @param command - Shell command line
 * @param env - Environment for the child process
 * @returns Raw standard output
 * @throws Error when the command exits non-zero
 */
export function runShellCommand(command: string, env: NodeJS.ProcessEnv): string {
  return execSync(command, {
    env,
    encoding: 'utf-8',
    stdio: ['inherit', 'pipe', 'pipe'],
  });
}
