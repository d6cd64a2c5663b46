export function buildUrl(template: string, params: Record<string, string | number>, baseUrl: string): string {
  const replaced = template.replace(/\{(\w+)\}/g, (_, key: string) =>
    encodeURIComponent(String(params[key] ?? '')),
  );
  return new URL(replaced, baseUrl).toString();
}

export function resolveUrl(href: string, baseUrl: string): string {
  try {
    return new URL(href.trim(), baseUrl).toString();
  } catch {
    return href;
  }
}
