// source/handler/media-type.ts

import path from 'node:path';
import mime from 'mime-types';

/**
 * Media type for a resource name. Configured extension mappings win over
 * the `mime-types` database; `undefined` means no Content-Type is sent.
 */
export const resolveMediaType = (
  name: string,
  overrides: Readonly<Record<string, string>> = {},
): string | undefined => {
  const extension = path.extname(name).slice(1).toLowerCase();
  const override = extension ? overrides[extension] : undefined;

  if (override) {
    return override;
  }

  const type = mime.lookup(name);
  return type === false ? undefined : type;
};
