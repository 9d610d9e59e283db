/**
 * Runs `task` with a signal that aborts on Ctrl+C. The SIGINT handler is
 * removed when the task settles, whether it resolved or rejected.
 */
export async function withInterrupt<T>(
  task: (signal: AbortSignal) => Promise<T>,
  onInterrupt?: () => void
): Promise<T> {
  const controller = new AbortController();
  const onSigint = () => {
    onInterrupt?.();
    controller.abort();
  };
  process.once('SIGINT', onSigint);
  try {
    return await task(controller.signal);
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}
