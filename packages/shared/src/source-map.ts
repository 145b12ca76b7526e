/**
 * Line-level provenance for generated code.
 *
 * Every generated line may carry an anchor pointing at the template position it was
 * produced from. Columns past `generatedColumn` are shifted onto the original column,
 * which is exact for text copied verbatim (code blocks, expressions).
 */

/** 0-based template position plus the generated column it lines up with. */
export interface SourceAnchor {
  line: number;
  column: number;
  generatedColumn: number;
}

/** Indexed by 0-based generated line. */
export type LineMap = readonly (SourceAnchor | null)[];

export interface MappedPosition {
  /** 0-based */
  line: number;
  /** 0-based */
  column: number;
}

/**
 * Map a generated position back to the template. Lines without an anchor inherit the
 * closest anchor above them. Without a line map the position is returned as-is.
 */
export function mapGeneratedPosition(
  lineMap: LineMap | undefined,
  line: number,
  column: number,
): MappedPosition {
  if (!lineMap) return { line, column };

  for (let i = Math.min(line, lineMap.length - 1); i >= 0; i--) {
    const anchor = lineMap[i];
    if (!anchor) continue;
    if (i !== line) return { line: anchor.line, column: anchor.column };
    const delta = column - anchor.generatedColumn;
    return { line: anchor.line, column: delta >= 0 ? anchor.column + delta : anchor.column };
  }
  return { line: 0, column: 0 };
}
