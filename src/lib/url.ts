export const serverUrl = (server: string, path: string): string => {
  const isAbs = /^https?:\/\//i.test(server);
  const base = isAbs ? server : `https://${server}`;
  return new URL(path, base).toString();
};

/** Replaces `{key}` placeholders; unknown keys are left as they are. */
export const expandPath = (template: string, params: Record<string, string>): string =>
  template.replace(/\{([^}]+)\}/g, (_, k: string) =>
    params[k] !== undefined ? encodeURIComponent(params[k]) : `{${k}}`,
  );
