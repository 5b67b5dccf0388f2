/**
 * Splits a command message into its arguments, dropping the command itself.
 * "/wlb  a b" => ["a", "b"]
 */
export function parseCommandArgs(text: string): string[] {
  return text.trim().split(/\s+/).slice(1);
}
