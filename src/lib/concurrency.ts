export async function runWithConcurrency<T, R>(
  items: T[],
  limit: number,
  handler: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let nextIndex = 0;
  let running = 0;

  return new Promise((resolve, reject) => {
    const launchNext = () => {
      if (nextIndex >= items.length && running === 0) {
        resolve(results);
        return;
      }
      while (running < limit && nextIndex < items.length) {
        const current = nextIndex++;
        running += 1;
        handler(items[current], current)
          .then((result) => {
            results[current] = result;
            running -= 1;
            launchNext();
          })
          .catch((err) => {
            reject(err);
          });
      }
    };
    launchNext();
  });
}
