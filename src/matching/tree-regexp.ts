/**
 * Capture-group tree over a regex source.
 *
 * JavaScript numbers capture groups flatly; parameter types may nest groups of
 * their own inside the single group a placeholder occupies. The tree restores
 * that nesting so a match can be read one placeholder at a time.
 *
 * @module tree-regexp
 */

/**
 * Position of one capturing group in the source, with the capturing groups nested inside it.
 */
export type GroupNode = {
    /** Index of the group in `RegExpExecArray` (0 for the whole match) */
    index: number;
    children: GroupNode[];
};

/**
 * One capturing group of a successful match.
 */
export type Group = {
    /** `undefined` when the group took no part in the match */
    value: string | undefined;
    start: number | undefined;
    end: number | undefined;
    children: Group[];
};

export type TreeRegexp = {
    readonly source: string;
    readonly regexp: RegExp;
    readonly groupTree: GroupNode;
    /** Matches `text` and returns the group for the whole match, or `null` */
    match: (text: string) => Group | null;
};

/**
 * Returns the length of the group prefix starting at `(`, and whether the group captures.
 *
 * @example
 * readGroupOpening('(?:a)', 0)   // → { capturing: false, length: 3 }
 * readGroupOpening('(?<n>a)', 0) // → { capturing: true, length: 5 }
 */
const readGroupOpening = (source: string, at: number): { capturing: boolean; length: number } => {
    if (source[at + 1] !== '?') {
        return { capturing: true, length: 1 };
    }
    const kind = source[at + 2];
    if (kind === '<' && source[at + 3] !== '=' && source[at + 3] !== '!') {
        const close = source.indexOf('>', at + 3);
        return { capturing: true, length: close - at + 1 };
    }
    // (?: (?= (?! (?<= (?<!
    return { capturing: false, length: kind === '<' ? 4 : 3 };
};

/**
 * Parses the capturing-group structure of a regex source.
 *
 * Escapes and character classes are skipped; non-capturing groups and
 * lookarounds are transparent, so their capturing descendants attach to the
 * nearest capturing ancestor.
 *
 * @example
 * buildGroupTree('^(a(b))(?:(c))$')
 * // → { index: 0, children: [{ index: 1, children: [{ index: 2, children: [] }] }, { index: 3, children: [] }] }
 */
export const buildGroupTree = (source: string): GroupNode => {
    const root: GroupNode = { children: [], index: 0 };
    // One entry per open group; null for a group that does not capture
    const stack: (GroupNode | null)[] = [];
    let nextIndex = 1;
    let inCharacterClass = false;

    const nearestCapturing = (): GroupNode => {
        for (let i = stack.length - 1; i >= 0; i--) {
            const node = stack[i];
            if (node) {
                return node;
            }
        }
        return root;
    };

    for (let i = 0; i < source.length; i++) {
        const ch = source[i];

        if (ch === '\\') {
            i++;
            continue;
        }
        if (inCharacterClass) {
            inCharacterClass = ch !== ']';
            continue;
        }
        if (ch === '[') {
            inCharacterClass = true;
            continue;
        }
        if (ch === '(') {
            const { capturing, length } = readGroupOpening(source, i);
            if (capturing) {
                const node: GroupNode = { children: [], index: nextIndex++ };
                nearestCapturing().children.push(node);
                stack.push(node);
            } else {
                stack.push(null);
            }
            i += length - 1;
            continue;
        }
        if (ch === ')') {
            stack.pop();
        }
    }

    return root;
};

const toGroup = (node: GroupNode, match: RegExpExecArray): Group => {
    const range = match.indices?.[node.index];
    return {
        children: node.children.map((child) => toGroup(child, match)),
        end: range?.[1],
        start: range?.[0],
        value: match[node.index],
    };
};

/**
 * Values a group hands to a transformer: its children's values when it has
 * nested groups, otherwise its own, with groups that did not participate dropped.
 */
export const getGroupValues = (group: Group): string[] => {
    const groups = group.children.length === 0 ? [group] : group.children;
    return groups.flatMap((g) => (g.value === undefined ? [] : [g.value]));
};

/**
 * Compiles `source` with match indices enabled and pairs it with its group tree.
 *
 * @throws {SyntaxError} when `source` is not a valid regular expression
 */
export const createTreeRegexp = (source: string): TreeRegexp => {
    const regexp = new RegExp(source, 'd');
    const groupTree = buildGroupTree(source);

    return {
        groupTree,
        match: (text) => {
            const match = regexp.exec(text);
            return match ? toGroup(groupTree, match) : null;
        },
        regexp,
        source,
    };
};
