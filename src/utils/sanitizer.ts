/**
 * Remote names are taken as given. Only an empty name, or one made of dots
 * alone, is replaced by 'file'.
 */
export function sanitizeFilename(name: string | undefined | null): string {
  if (!name || /^\.+$/.test(name)) return "file";
  return name;
}

export function remoteFileName(name: string, prefix: string, suffix: string): string {
  return `${prefix}${sanitizeFilename(name)}${suffix}`;
}

/** Joins the base URL and remote name, encoding each path segment. */
export function remoteUrl(baseUrl: string, fileName: string): string {
  const encoded = fileName
    .split("/")
    .map((segment) => encodeURIComponent(segment))
    .join("/");
  return `${baseUrl.replace(/\/+$/, "")}/${encoded}`;
}
