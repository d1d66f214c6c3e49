export type LabelSelector = ReadonlyArray<readonly [key: string, value: string]>;

/**
 * Parse a selector of comma-separated key=value terms
 */
export function parseLabelSelector(selector: string): LabelSelector {
  const terms: Array<[string, string]> = [];

  for (const raw of selector.split(",")) {
    const term = raw.trim();
    if (term === "") {
      continue;
    }
    const separator = term.indexOf("=");
    if (separator <= 0) {
      throw new Error(`invalid label selector term [${term}]`);
    }
    terms.push([term.slice(0, separator).trim(), term.slice(separator + 1).trim()]);
  }

  return terms;
}

export function matchesLabels(labels: Record<string, string>, selector: LabelSelector): boolean {
  return selector.every(([key, value]) => labels[key] === value);
}
