export const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;

export const isMissingFile = (error: unknown): boolean =>
  isErrnoException(error) && error.code === 'ENOENT';
