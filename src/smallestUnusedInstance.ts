export function smallestUnusedInstance(used: Iterable<number>): number {
    const taken = new Set(used);
    let candidate = 0;
    while (taken.has(candidate)) {
        ++candidate;
    }
    return candidate;
}
