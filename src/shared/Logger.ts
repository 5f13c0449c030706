export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** 接收已序列化的單行 JSON；預設寫到 stderr，測試可替換 */
export type LogSink = (line: string) => void;

const LEVELS: Record<LogLevel, number> = {
  debug: 0, info: 1, warn: 2, error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVELS;
}

function levelFromEnv(raw: string | undefined): LogLevel {
  return isLogLevel(raw) ? raw : 'info';
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

/**
 * 結構化 JSON logger
 *
 * 每筆 log 一行 JSON（timestamp / level / context / message + 附加欄位），
 * 一律寫到 stderr，讓 stdout 保留給 CLI 的批次摘要輸出。
 * child() 綁定 documentId、stage 等欄位，讓每行 log 都帶有診斷所需的上下文。
 */
export class Logger {
  private static defaultLevel: LogLevel = levelFromEnv(process.env.LOG_LEVEL);
  private static defaultSink: LogSink = stderrSink;

  constructor(
    private readonly context: string,
    private readonly minLevel: LogLevel = Logger.defaultLevel,
    private readonly bindings: Record<string, unknown> = {},
    private readonly sink: LogSink = Logger.defaultSink,
  ) {}

  /** 設定之後新建 Logger 的預設層級（CLI 讀完設定後呼叫） */
  static configure(opts: { level?: LogLevel; sink?: LogSink }): void {
    if (opts.level) Logger.defaultLevel = opts.level;
    if (opts.sink) Logger.defaultSink = opts.sink;
  }

  /** 建立綁定額外欄位的子 logger */
  child(bindings: Record<string, unknown>): Logger {
    return new Logger(this.context, this.minLevel, { ...this.bindings, ...bindings }, this.sink);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVELS[level] < LEVELS[this.minLevel]) return;
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      context: this.context,
      message,
      ...this.bindings,
      ...data,
    };
    this.sink(JSON.stringify(entry));
  }

  debug(msg: string, data?: Record<string, unknown>) { this.log('debug', msg, data); }
  info(msg: string, data?: Record<string, unknown>) { this.log('info', msg, data); }
  warn(msg: string, data?: Record<string, unknown>) { this.log('warn', msg, data); }
  error(msg: string, data?: Record<string, unknown>) { this.log('error', msg, data); }
}

/** 把任意 thrown 值轉成可放進 log 的欄位 */
export function errorFields(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
    return { error: err.message, errorName: err.name, ...(code ? { errorCode: code } : {}) };
  }
  return { error: String(err) };
}
