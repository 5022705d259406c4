/**
 * Redact credentials from stream target URLs before they reach a log line.
 *
 * Ingest URLs carry the publish secret in the last path segment
 * (`rtmp://host/app/<stream-key>`), in userinfo, or in query parameters
 * (`srt://host:port?streamid=...&passphrase=...`).
 */

const SECRET_QUERY_KEYS = /^(key|streamkey|stream_key|streamid|passphrase|token|secret|auth|pass|password)$/i;

export function redactStreamUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    // Not a URL we understand; keep only the scheme-ish prefix
    const idx = url.indexOf("://");
    return idx === -1 ? "[REDACTED]" : `${url.slice(0, idx + 3)}[REDACTED]`;
  }

  if (parsed.username) parsed.username = "REDACTED";
  if (parsed.password) parsed.password = "REDACTED";

  for (const key of [...parsed.searchParams.keys()]) {
    if (SECRET_QUERY_KEYS.test(key)) parsed.searchParams.set(key, "REDACTED");
  }

  const segments = parsed.pathname.split("/");
  // rtmp://host/app/key: the app name stays, anything after it is the key
  if (segments.length > 2 && segments[segments.length - 1]) {
    segments[segments.length - 1] = "REDACTED";
    parsed.pathname = segments.join("/");
  }

  return parsed.toString();
}
