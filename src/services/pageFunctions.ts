/**
 * For each element, whether no other element in the list contains it. Runs
 * inside the page through `evaluateAll`, so it must stay self-contained.
 */
export function outermostFlags(elements: Element[]): boolean[] {
  return elements.map(
    (el) => !elements.some((other) => other !== el && other.contains(el))
  );
}

export function joinSignature(texts: string[]): string {
  return texts.map((t) => t.trim()).join("\n");
}
