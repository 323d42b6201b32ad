const resolveApiBase = (): string => {
  const envBase = (process.env.MINIAPP_API_BASE ?? '').trim();

  const fallbackBase =
    typeof window !== 'undefined'
      ? `${window.location.origin}`.replace(/\/+$/, '')
      : '';

  const base = envBase || fallbackBase;
  return base.replace(/\/+$/, '');
};

export const buildApiUrl = (path: string): string => {
  const base = resolveApiBase();
  if (!path.startsWith('/')) {
    return `${base}/${path}`;
  }
  return `${base}${path}`;
};
