/**
 * User-facing strings in English and Chinese.
 */

export type Lang = 'en' | 'zh';

export const LANGS: readonly Lang[] = ['en', 'zh'];

export interface Messages {
  usageTitle: string;
  usage: string;
  examples: string;
  exampleLines: string[];
  options: string;
  optionLines: string[];
  supportedTypes: string;
  typeLines: string[];
  note: string;
  detailedHelp: string;
  missingArgs: string;
  pathNotFound(path: string): string;
  processingError(message: string): string;
  noConfFiles(dir: string): string;
  annotated(file: string, count: number): string;
  unchanged(file: string): string;
  wouldAnnotate(file: string, count: number): string;
  cancelled: string;
  summary(stats: SummaryStats): string;
}

export interface SummaryStats {
  files: number;
  annotated: number;
  skipped: number;
  errors: number;
}

const TYPE_LINES = [
  'int:     return 1;',
  'pair:    return (1, 2);  ->  pair (int, int)',
  'ip:      return 1.2.3.4;',
  'prefix:  return 1.2.3.4/32; return net;',
  'string:  return "hello";',
  'set:     return {1, 2, 3};',
  'bool:    return net ~ PREFIXES;',
];

const plural = (n: number, word: string): string => `${n} ${word}${n === 1 ? '' : 's'}`;

const EN: Messages = {
  usageTitle: 'BIRD2 Auto Type Completion',
  usage: 'Usage',
  examples: 'Examples',
  exampleLines: [
    'bird-typefill config.conf            # Process single file',
    'bird-typefill -i config.conf         # Modify file in-place',
    'bird-typefill /path/to/configs/      # Batch process directory',
    'bird-typefill --check /etc/bird/     # Exit 3 if anything needs annotating',
  ],
  options: 'Options',
  optionLines: [
    '-i, --in-place       Modify files in-place',
    '--check              Report pending annotations, write nothing',
    '--no-recursive       Only look at the top level of a directory',
    '-j, --jobs <n>       Files processed concurrently (default: CPU count)',
    '--config <file>      Read options from a JSON file',
    '--lang <en|zh>       Message language',
    '-v, --verbose        Report every function, not only skips',
    '-h, --help           Show help',
  ],
  supportedTypes: 'Supported types',
  typeLines: TYPE_LINES,
  note: 'Note: Void functions remain unchanged',
  detailedHelp: 'For help: bird-typefill --help',
  missingArgs: 'Error: Missing arguments',
  pathNotFound: path => `Error: Path '${path}' not found`,
  processingError: message => `Error: ${message}`,
  noConfFiles: dir => `No .conf files in ${dir}`,
  annotated: (file, count) => `Annotated ${plural(count, 'function')}: ${file}`,
  unchanged: file => `Unchanged: ${file}`,
  wouldAnnotate: (file, count) => `Would annotate ${plural(count, 'function')}: ${file}`,
  cancelled: 'Cancelled; remaining files were not processed',
  summary: s =>
    `Done: ${plural(s.annotated, 'function')} annotated, ${s.skipped} skipped, ` +
    `${plural(s.errors, 'error')} in ${plural(s.files, 'file')}.`,
};

const ZH: Messages = {
  usageTitle: 'BIRD2 Auto Type Completion',
  usage: '用法',
  examples: '示例',
  exampleLines: [
    'bird-typefill config.conf            # 处理单个文件',
    'bird-typefill -i config.conf         # 直接修改文件',
    'bird-typefill /path/to/configs/      # 批量处理目录',
    'bird-typefill --check /etc/bird/     # 如需补全则以 3 退出',
  ],
  options: '选项',
  optionLines: [
    '-i, --in-place       直接修改文件',
    '--check              仅报告需要补全的函数, 不写文件',
    '--no-recursive       只处理目录顶层',
    '-j, --jobs <n>       并发处理的文件数 (默认: CPU 数)',
    '--config <file>      从 JSON 文件读取选项',
    '--lang <en|zh>       提示语言',
    '-v, --verbose        报告所有函数',
    '-h, --help           显示帮助',
  ],
  supportedTypes: '支持类型',
  typeLines: TYPE_LINES,
  note: '注: 无返回值函数将保持不变',
  detailedHelp: '详细帮助: bird-typefill --help',
  missingArgs: '错误: 缺少参数',
  pathNotFound: path => `错误: 路径 '${path}' 不存在`,
  processingError: message => `处理错误: ${message}`,
  noConfFiles: dir => `目录 ${dir} 中无 .conf 文件`,
  annotated: (file, count) => `已补全 ${count} 个函数: ${file}`,
  unchanged: file => `未改动: ${file}`,
  wouldAnnotate: (file, count) => `需补全 ${count} 个函数: ${file}`,
  cancelled: '已取消, 其余文件未处理',
  summary: s =>
    `完成: 补全 ${s.annotated} 个函数, 跳过 ${s.skipped} 个, ` +
    `${s.errors} 个错误, 共 ${s.files} 个文件.`,
};

export function messagesFor(lang: Lang): Messages {
  return lang === 'zh' ? ZH : EN;
}

/**
 * Pick the message language from the locale environment variables.
 */
export function detectLang(env: NodeJS.ProcessEnv): Lang {
  for (const name of ['LANG', 'LC_ALL', 'LC_MESSAGES']) {
    const value = (env[name] ?? '').toLowerCase();
    if (value.includes('zh') || value.includes('cn')) return 'zh';
  }
  return 'en';
}
