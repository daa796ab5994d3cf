export type DotAttributes = Record<string, string | number | undefined>;

export function quote(text: string): string {
  return `"${text.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n')}"`;
}

function formatAttributes(attributes: DotAttributes): string {
  const parts = Object.entries(attributes)
    .filter((entry): entry is [string, string | number] => entry[1] !== undefined)
    .map(([key, value]) => `${key}=${quote(String(value))}`);
  return parts.length > 0 ? ` [${parts.join(', ')}]` : '';
}

/** Accumulates a directed graph in Graphviz DOT syntax. */
export class DotWriter {
  private readonly lines: string[] = [];

  constructor(
    private readonly name: string,
    graphAttributes: DotAttributes = {}
  ) {
    for (const [key, value] of Object.entries(graphAttributes)) {
      if (value !== undefined) {
        this.lines.push(`  ${key}=${quote(String(value))};`);
      }
    }
  }

  node(id: string, attributes: DotAttributes = {}): this {
    this.lines.push(`  ${quote(id)}${formatAttributes(attributes)};`);
    return this;
  }

  edge(from: string, to: string, attributes: DotAttributes = {}): this {
    this.lines.push(`  ${quote(from)} -> ${quote(to)}${formatAttributes(attributes)};`);
    return this;
  }

  toString(): string {
    return [`digraph ${quote(this.name)} {`, ...this.lines, '}', ''].join('\n');
  }
}
