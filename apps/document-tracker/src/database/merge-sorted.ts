/**
 * Merges async sequences that are each already ascending by `sortKey` into a
 * single ascending sequence. Sources are pulled lazily, one item ahead, and
 * closed when the merged sequence ends or the caller stops early.
 */
export async function* mergeSorted<T>(
    sources: Array<AsyncIterable<T>>,
    sortKey: (item: T) => string,
): AsyncGenerator<T> {
    const iterators = sources.map((source) => source[Symbol.asyncIterator]());
    const heads: Array<{ value: T; key: string } | null> = [];

    const pull = async (index: number): Promise<void> => {
        const result = await iterators[index].next();
        heads[index] = result.done ? null : { value: result.value, key: sortKey(result.value) };
    };

    try {
        await Promise.all(iterators.map((_, index) => pull(index)));

        for (;;) {
            let next = -1;
            let head: { value: T; key: string } | null = null;
            for (let index = 0; index < heads.length; index++) {
                const candidate = heads[index];
                if (candidate !== null && (head === null || candidate.key < head.key)) {
                    next = index;
                    head = candidate;
                }
            }

            if (head === null) {
                return;
            }

            yield head.value;
            await pull(next);
        }
    } finally {
        await Promise.all(iterators.map((iterator) => iterator.return?.()));
    }
}
