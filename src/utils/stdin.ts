/**
 * Command text from arguments or piped stdin
 */

export interface InputStream extends AsyncIterable<unknown> {
  isTTY?: boolean;
}

/**
 * Joined arguments when given, else the whole of a piped stdin. Returns null
 * for an interactive terminal with no arguments, where reading would block.
 */
export async function readTextInput(words: readonly string[], stdin: InputStream): Promise<string | null> {
  if (words.length > 0) return words.join(' ');
  if (stdin.isTTY) return null;

  const chunks: Buffer[] = [];
  for await (const chunk of stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}
