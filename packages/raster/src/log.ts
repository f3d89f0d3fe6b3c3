export type DebugLog = (message: string, payload?: Record<string, unknown>) => void;

/** `[Tag][debug]` console logger that does nothing unless enabled. */
export function createDebugLog(tag: string, enabled = false): DebugLog {
  return (message, payload) => {
    if (!enabled) return;
    if (payload) {
      console.log(`[${tag}][debug]`, message, payload);
    } else {
      console.log(`[${tag}][debug]`, message);
    }
  };
}
