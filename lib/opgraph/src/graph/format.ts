import type { GraphNode } from './walker';

function addIndent(text: string, spaces: number): string {
  const lines = text.split('\n');
  // single-line output stays as is
  if (lines.length === 1) {
    return text;
  }
  const first = lines.shift();
  const padding = ' '.repeat(spaces);
  return [first, ...lines.map(line => padding + line)].join('\n');
}

/**
 * Renders a tree with one `(childName): Child(...)` entry per line
 *
 * @example
 * ```text
 * Pipeline(
 *   (tokenize): Tokenizer()
 *   (embed): Embedder()
 * )
 * ```
 */
export function formatOperator<T extends GraphNode<T>>(root: T): string {
  const childLines = [...root.children()].map(
    ([key, child]) => `(${key}): ${addIndent(formatOperator(child), 2)}`
  );

  let text = `${root.name}(`;
  if (childLines.length > 0) {
    text += `\n  ${childLines.join('\n  ')}\n`;
  }
  return `${text})`;
}
