// engine/src/log.ts

function isDebug(scope: string): boolean {
  const v = process.env.DEBUG_BOT || "";
  if (v === "1" || v === "true") return true;
  return v.toLowerCase().includes(scope.toLowerCase());
}

/** Verbose log line, printed only when DEBUG_BOT enables the scope. */
export function debugLog(scope: string, ...args: unknown[]) {
  if (!isDebug(scope)) return;
  console.log(`[${scope}]`, ...args);
}

/** Short stable id for logs; never print full chat ids. */
export function shortId(userId: string): string {
  return userId.length > 6 ? `${userId.slice(0, 3)}…${userId.slice(-3)}` : userId;
}
