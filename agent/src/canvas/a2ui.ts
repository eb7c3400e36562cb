/** Path prefix the gateway reserves for the A2UI host page */
export const A2UI_HOST_PATH = "/__openclaw__/a2ui/";

/**
 * A2UI host URL served by the gateway: same host and port, ws → http and
 * wss → https.
 */
export function buildA2UIHostUrl(gatewayUrl: string | null | undefined): string | null {
	if (!gatewayUrl?.trim()) return null;
	let uri: URL;
	try {
		uri = new URL(gatewayUrl);
	} catch {
		return null;
	}
	const secure = uri.protocol === "wss:" || uri.protocol === "https:";
	const scheme = secure ? "https" : "http";
	const port = uri.port || (secure ? "443" : "80");
	return `${scheme}://${uri.hostname}:${port}${A2UI_HOST_PATH}`;
}

export function isTrustedA2UIUrl(url: string | null | undefined): boolean {
	if (!url) return false;
	let uri: URL;
	try {
		uri = new URL(url);
	} catch {
		return false;
	}
	if (uri.protocol !== "http:" && uri.protocol !== "https:") return false;
	return uri.pathname.toLowerCase().startsWith(A2UI_HOST_PATH);
}

/** Non-blank, trimmed lines of a JSON-lines payload */
export function splitJsonlMessages(jsonl: string): string[] {
	return jsonl
		.split(/\r?\n/)
		.map((line) => line.trim())
		.filter((line) => line.length > 0);
}

const A2UI_GLOBALS = ["__a2ui", "a2ui", "A2UI"] as const;

export function buildA2UIMessageScript(json: string): string {
	const attempts = A2UI_GLOBALS.flatMap((g) =>
		["receive", "push", "ingest"].map(
			(method) => `  if (trySend(window.${g}, '${method}')) return 'ok';`,
		),
	).join("\n");
	return `(() => {
  const msg = ${JSON.stringify(json)};
  let parsed;
  try { parsed = JSON.parse(msg); } catch { parsed = msg; }
  const trySend = (target, method) => {
    if (target && typeof target[method] === 'function') { target[method](parsed); return true; }
    return false;
  };
${attempts}
  return 'missing';
})()`;
}

export function buildA2UIResetScript(): string {
	const attempts = A2UI_GLOBALS.flatMap((g) =>
		["reset", "clear"].map((method) => `  if (tryCall(window.${g}, '${method}')) return 'ok';`),
	).join("\n");
	return `(() => {
  const tryCall = (target, method) => {
    if (target && typeof target[method] === 'function') { target[method](); return true; }
    return false;
  };
${attempts}
  return 'missing';
})()`;
}
