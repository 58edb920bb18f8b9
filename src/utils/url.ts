export function isHttpOrHttpsUrl(candidateUrl: string): boolean {
  try {
    const parsedUrl = new URL(candidateUrl);
    return parsedUrl.protocol === 'http:' || parsedUrl.protocol === 'https:';
  } catch { return false; }
}

/** Junta base e caminho com exatamente uma barra entre eles. */
export function joinUrl(baseUrl: string, resourcePath: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${resourcePath.replace(/^\/+/, '')}`;
}
