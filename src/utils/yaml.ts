import { Document, isMap, isSeq, visit } from 'yaml';

export interface DumpYamlOptions {
  /** Collections nested at least this deep are written in flow style. */
  inlineDepth: number;
  indent?: number;
}

/** Block-style YAML with multi-line strings as literal blocks. */
export function dumpYaml(value: unknown, opts: DumpYamlOptions): string {
  const doc = new Document(value);
  visit(doc, {
    Map(_key, node, path) {
      if (collectionDepth(path) >= opts.inlineDepth) node.flow = true;
    },
    Seq(_key, node, path) {
      if (collectionDepth(path) >= opts.inlineDepth) node.flow = true;
    },
  });
  return doc.toString({ indent: opts.indent ?? 2, lineWidth: 0, blockQuote: 'literal' });
}

function collectionDepth(path: readonly unknown[]): number {
  return path.filter((node) => isMap(node) || isSeq(node)).length;
}
