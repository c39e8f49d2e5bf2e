import path from 'path';

export const getErrorMessage = (err: unknown): string => err instanceof Error ? err.message : String(err);

/** Uses `provided` as is when it has an extension; otherwise derives `<name>.<ext>` from it or from the input path. */
export const resolveOutputPath = (inputPath: string, provided: string | null, ext: string): string => {
  if (provided) {
    const parsed = path.parse(provided);
    if (parsed.ext) return provided;
    return path.join(parsed.dir || '.', `${parsed.name || parsed.base || 'output'}.${ext}`);
  }
  const parsed = path.parse(inputPath);
  return path.join(parsed.dir, `${parsed.name}.${ext}`);
};
