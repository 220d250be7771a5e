import { interval, type Subscription } from 'rxjs';
import { StateNotifier } from '../state/state-notifier.js';

export interface RestTimerState {
  isResting: boolean;
  remainingSeconds: number;
  /** Length of the rest as started, before any added or removed time */
  originalSeconds: number;
}

const IDLE: RestTimerState = { isResting: false, remainingSeconds: 0, originalSeconds: 0 };

export function formatRestTime(seconds: number): string {
  const minutes = Math.floor(seconds / 60);
  const rest = seconds % 60;
  return `${String(minutes).padStart(2, '0')}:${String(rest).padStart(2, '0')}`;
}

/**
 * Counts a rest period down once per second. Completion listeners run
 * when the countdown reaches zero, not when the rest is skipped.
 */
export class RestTimer extends StateNotifier<RestTimerState> {
  private ticker: Subscription | null = null;
  private readonly completionListeners = new Set<() => void>();

  constructor() {
    super(IDLE);
  }

  get formattedTime(): string {
    return formatRestTime(this.getState().remainingSeconds);
  }

  /** Elapsed share of the original rest, 0..1 */
  get progress(): number {
    const { originalSeconds, remainingSeconds } = this.getState();
    if (originalSeconds <= 0) {
      return 0;
    }
    return Math.min(1, Math.max(0, (originalSeconds - remainingSeconds) / originalSeconds));
  }

  get isRunning(): boolean {
    return this.ticker !== null;
  }

  start(seconds: number, elapsedSeconds = 0): void {
    this.stopTicking();
    const remaining = Math.floor(seconds - elapsedSeconds);
    if (remaining <= 0) {
      this.skip();
      return;
    }
    this.setState({ isResting: true, remainingSeconds: remaining, originalSeconds: seconds });
    this.startTicking();
  }

  skip(): void {
    this.stopTicking();
    this.setState(IDLE);
  }

  pause(): void {
    this.stopTicking();
  }

  resume(): void {
    const state = this.getState();
    if (!state.isResting || state.remainingSeconds <= 0 || this.isRunning) {
      return;
    }
    this.startTicking();
  }

  addTime(seconds: number): void {
    const state = this.getState();
    if (state.isResting) {
      this.setState({ ...state, remainingSeconds: state.remainingSeconds + seconds });
    }
  }

  subtractTime(seconds: number): void {
    const state = this.getState();
    if (!state.isResting) {
      return;
    }
    const remainingSeconds = Math.max(0, state.remainingSeconds - seconds);
    if (remainingSeconds === 0) {
      this.skip();
      return;
    }
    this.setState({ ...state, remainingSeconds });
  }

  onComplete(listener: () => void): () => void {
    this.completionListeners.add(listener);
    return () => {
      this.completionListeners.delete(listener);
    };
  }

  override dispose(): void {
    this.stopTicking();
    this.completionListeners.clear();
    super.dispose();
  }

  private startTicking(): void {
    this.ticker = interval(1000).subscribe(() => this.tick());
  }

  private stopTicking(): void {
    this.ticker?.unsubscribe();
    this.ticker = null;
  }

  private tick(): void {
    const state = this.getState();
    const remainingSeconds = state.remainingSeconds - 1;
    if (remainingSeconds > 0) {
      this.setState({ ...state, remainingSeconds });
      return;
    }
    this.stopTicking();
    this.setState({ ...state, isResting: false, remainingSeconds: 0 });
    for (const listener of [...this.completionListeners]) {
      listener();
    }
  }
}
