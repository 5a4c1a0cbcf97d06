/** Helper: collect all items from an async iterable. */
export async function collect<T>(iter: AsyncIterable<T>): Promise<T[]> {
	const result: T[] = [];
	for await (const item of iter) result.push(item);
	return result;
}

/** Helper: values of collected [key, value] pairs. */
export async function collectValues<K, V>(iter: AsyncIterable<[K, V]>): Promise<V[]> {
	return (await collect(iter)).map(([, value]) => value);
}

/** Helper: keys of collected [key, value] pairs. */
export async function collectKeys<K, V>(iter: AsyncIterable<[K, V]>): Promise<K[]> {
	return (await collect(iter)).map(([key]) => key);
}
