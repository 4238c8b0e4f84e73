export const stripAnsi = (str: string): string => {
  // ANSI escape codes are sequences that start with `\x1b[` and end with a letter.
  return str.replace(/\u001b\[[0-9;]*[a-zA-Z]/g, '');
};

/**
 * Keeps the last `lines` lines of `str`.
 */
export const tailLines = (str: string, lines: number): string => {
  const all = str.split(/\r?\n/);
  return all.slice(Math.max(0, all.length - lines)).join('\n');
};
