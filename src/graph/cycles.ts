interface Frame {
    id: string;
    next: Iterator<string>;
}

/**
 * Depth-first cycle search tracking the in-progress path.
 * Returns the ids along the first cycle found, or null for a DAG.
 */
export function findCycle(
    nodes: Iterable<string>,
    successors: (id: string) => Iterable<string>
): string[] | null {
    const done = new Set<string>();
    const active = new Set<string>();

    for (const root of nodes) {
        if (done.has(root)) continue;

        const path: string[] = [root];
        const stack: Frame[] = [{ id: root, next: successors(root)[Symbol.iterator]() }];
        active.add(root);

        while (stack.length > 0) {
            const frame = stack[stack.length - 1];
            const step = frame.next.next();

            if (step.done) {
                stack.pop();
                path.pop();
                active.delete(frame.id);
                done.add(frame.id);
                continue;
            }

            const child = step.value;
            if (active.has(child)) {
                return path.slice(path.indexOf(child));
            }
            if (!done.has(child)) {
                active.add(child);
                path.push(child);
                stack.push({ id: child, next: successors(child)[Symbol.iterator]() });
            }
        }
    }

    return null;
}
