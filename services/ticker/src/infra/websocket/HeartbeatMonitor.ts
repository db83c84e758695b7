export interface HeartbeatOptions {
  /** ping の送信間隔（ミリ秒） */
  intervalMs: number;
  /** intervalMs の何倍受信がなければ途絶とみなすか */
  timeoutMultiplier: number;
}

export interface HeartbeatCallbacks {
  ping(): void;
  /** 途絶を検知したときに 1 度だけ呼ばれる（呼ばれた時点で監視は停止済み） */
  onTimeout(silentForMs: number): void;
}

/**
 * インフラ層: 接続の生存監視
 *
 * intervalMs ごとに ping を送り、フレームか pong を最後に受け取ってから
 * intervalMs * timeoutMultiplier 以上経過していればタイムアウトとして通知する。
 */
export class HeartbeatMonitor {
  private timer: NodeJS.Timeout | null = null;
  private lastSeenAt = 0;

  constructor(
    private readonly options: HeartbeatOptions,
    private readonly callbacks: HeartbeatCallbacks
  ) {}

  start(): void {
    this.stop();
    this.lastSeenAt = Date.now();
    this.timer = setInterval(() => this.check(), this.options.intervalMs);
  }

  /**
   * 受信があったことを記録する
   */
  touch(): void {
    this.lastSeenAt = Date.now();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get timeoutMs(): number {
    return this.options.intervalMs * this.options.timeoutMultiplier;
  }

  private check(): void {
    const silentForMs = Date.now() - this.lastSeenAt;
    if (silentForMs >= this.timeoutMs) {
      this.stop();
      this.callbacks.onTimeout(silentForMs);
      return;
    }
    this.callbacks.ping();
  }
}
