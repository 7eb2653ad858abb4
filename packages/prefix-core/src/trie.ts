/**
 * Prefix trie over UTF-16 code units
 */

export type NodeId = number;

const ROOT: NodeId = 0;

/**
 * Arena-backed trie. Nodes are integer handles into parallel arrays, so the
 * whole tree is dropped with the instance.
 */
export class PrefixTrie {
  private kids: Map<string, NodeId>[] = [new Map()];
  private ends: boolean[] = [false];
  private passes: number[] = [0];
  private inserted = 0;

  /** Number of strings inserted so far */
  get size(): number {
    return this.inserted;
  }

  /** Number of allocated nodes, root included */
  get nodeCount(): number {
    return this.kids.length;
  }

  /**
   * Add a word, bumping the pass count of every node on its path
   * @returns Handle of the word's terminal node
   */
  insert(word: string): NodeId {
    let node = ROOT;
    this.passes[node]++;

    for (let i = 0; i < word.length; i++) {
      const ch = word[i];
      let kid = this.kids[node].get(ch);
      if (kid === undefined) {
        kid = this.alloc();
        this.kids[node].set(ch, kid);
      }
      node = kid;
      this.passes[node]++;
    }

    this.ends[node] = true;
    this.inserted++;
    return node;
  }

  /**
   * Longest prefix shared by every inserted word. Stops at a branch, at a
   * word end, or where a child is not passed through by all words.
   */
  longestCommonPrefix(): string {
    if (this.inserted === 0) return '';

    let prefix = '';
    let node = ROOT;

    while (!this.ends[node] && this.kids[node].size === 1) {
      const [[ch, kid]] = this.kids[node];
      if (this.passes[kid] !== this.inserted) break;
      prefix += ch;
      node = kid;
    }

    return prefix;
  }

  private alloc(): NodeId {
    this.kids.push(new Map());
    this.ends.push(false);
    this.passes.push(0);
    return this.kids.length - 1;
  }
}

/**
 * Build a trie holding every string
 */
export function build(strings: readonly string[]): PrefixTrie {
  const trie = new PrefixTrie();
  for (const s of strings) trie.insert(s);
  return trie;
}
