const ESC = '\x1b';

const hyperlink = (uri: string, label: string): string => `${ESC}]8;;${uri}${ESC}\\${label}${ESC}]8;;${ESC}\\`;

// buildSampleOutput fills the playground terminal with enough text to scroll,
// plain URLs, an explicit hyperlink and a line long enough to soft-wrap.
export const buildSampleOutput = (lineCount = 200): string => {
  const lines: string[] = [];
  for (let i = 0; i < lineCount; i += 1) {
    const n = String(i).padStart(3, '0');
    if (i % 25 === 0) {
      lines.push(`${n} see https://example.test/notes/${i}?tab=log for details`);
    } else if (i % 25 === 12) {
      lines.push(`${n} explicit link: ${hyperlink(`https://example.test/anchor/${i}`, 'open anchor')}`);
    } else {
      lines.push(`${n} build_step_${i} finished in ${(i * 7) % 113}ms`);
    }
  }
  lines.push(`wrapped: ${'word '.repeat(40)}(mailto:someone@example.test)`);
  lines.push('double-click a word, triple-click a line, hold Ctrl/Cmd and click a link.');
  return `${lines.join('\r\n')}\r\n`;
};
