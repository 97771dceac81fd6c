const FENCED_BLOCK_PATTERN = /```([^\n`]*)\n([\s\S]*?)```/gu;

export type FencedBlock = {
  readonly tag: string;
  readonly body: string;
};

export function findFencedBlocks(text: string): FencedBlock[] {
  const blocks: FencedBlock[] = [];
  for (const match of text.matchAll(FENCED_BLOCK_PATTERN)) {
    blocks.push({
      tag: (match[1] ?? "").trim().split(/\s+/u)[0]?.toLowerCase() ?? "",
      body: match[2] ?? "",
    });
  }
  return blocks;
}

/**
 * Returns the body of the last fenced block, preferring blocks tagged with `language`.
 * `null` when the text has no non-empty fenced block.
 */
export function extractProgram(text: string, language?: string): string | null {
  const blocks = findFencedBlocks(text).filter((block) => block.body.trim().length > 0);
  const wanted = language?.trim().toLowerCase();
  const tagged = wanted ? blocks.filter((block) => block.tag === wanted) : [];
  const chosen = (tagged.length > 0 ? tagged : blocks).at(-1);
  return chosen ? chosen.body.trim() : null;
}
