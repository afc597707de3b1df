export function printHelp(message?: string): void {
  if (message) {
    console.error(message);
    console.error('');
  }

  const lines = [
    'msgbox — modal message boxes in the terminal',
    '',
    'Usage: msgbox <command> [options]',
    '',
    formatSection('Commands', [
      ['show', 'Show a message box and print the outcome as JSON'],
      ['measure', 'Print the optimal WIDTHxHEIGHT for a message'],
      ['help', 'Show this help'],
    ]),
    '',
    formatSection('Global options', [
      ['-h, --help', 'Show help (also: msgbox <command> --help)'],
      ['-v, --version', 'Show version'],
    ]),
    '',
    formatSection('Config', [
      ['.msgboxrc.json', 'Nearest one up from the working directory'],
      ['~/.config/msgbox/config.json', 'Used when no local config exists'],
    ]),
  ];

  console.error(lines.join('\n'));
}

export function formatSection(title: string, rows: [string, string][]): string {
  const width = Math.max(...rows.map(([name]) => name.length));
  return [`${title}:`, ...rows.map(([name, desc]) => `  ${name.padEnd(width)}  ${desc}`)].join('\n');
}

export function printVersion(version: string): void {
  console.log(version);
}
