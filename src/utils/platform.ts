/**
 * Platform detection utilities
 *
 * Used to decide whether the progress spinner is shown.
 */

/**
 * Check if running in a PowerShell host environment
 *
 * PowerShell renders ora's cursor control as CLIXML progress records,
 * so the spinner is disabled there.
 */
export function isPowerShellHost(): boolean {
  if (process.env.PSModulePath) {
    return true;
  }

  if (process.env.POWERSHELL_DISTRIBUTION_CHANNEL) {
    return true;
  }

  const comSpec = process.env.ComSpec || '';
  return comSpec.toLowerCase().includes('powershell');
}

/**
 * Check if running in an interactive TTY environment
 *
 * All three streams (stdin, stdout, stderr) should be TTY for
 * truly interactive use where spinner makes sense.
 */
export function isInteractiveTTY(): boolean {
  return (
    process.stdin.isTTY === true &&
    process.stdout.isTTY === true &&
    process.stderr.isTTY === true
  );
}
