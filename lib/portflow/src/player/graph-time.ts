/**
 * Frame timing of a player. Purely observational: read by frame-driven
 * nodes and monitors, never used to schedule.
 */
export class GraphTime {
  private targetFrames: number;
  private count = 0;
  private elapsed = 0;
  private delta = 0;
  private lastTimestamp: number | null = null;

  /**
   * @param frames Target frame rate
   * @param clock Millisecond timestamp source
   */
  constructor(
    frames = 30,
    private readonly clock: () => number = () => performance.now()
  ) {
    this.targetFrames = GraphTime.checkFrames(frames);
  }

  /** Target frame rate */
  get frames(): number {
    return this.targetFrames;
  }

  set frames(value: number) {
    this.targetFrames = GraphTime.checkFrames(value);
  }

  /** Frames elapsed since the player started */
  get frameCount(): number {
    return this.count;
  }

  /** Seconds elapsed since the player started, summed over frames */
  get time(): number {
    return this.elapsed;
  }

  /** Seconds between the last two frames */
  get deltaTime(): number {
    return this.delta;
  }

  /**
   * Frame duration in seconds the player tries to keep
   */
  frameDuration(): number {
    return 1 / this.targetFrames;
  }

  /**
   * Average frame rate since the start
   */
  avgFps(): number {
    return this.elapsed === 0 ? 0 : this.count / this.elapsed;
  }

  /**
   * Frame rate measured on the last frame
   */
  currentFps(): number {
    return this.delta === 0 ? 0 : 1 / this.delta;
  }

  /**
   * Resets counters and starts measuring from now
   */
  start(): void {
    this.reset();
    this.lastTimestamp = this.clock();
  }

  /**
   * Measures from now again, dropping the time spent paused
   */
  resume(): void {
    this.lastTimestamp = this.clock();
  }

  /**
   * Records the start of a new frame
   */
  tick(): void {
    const now = this.clock();
    this.count += 1;
    this.delta = this.lastTimestamp === null ? 0 : (now - this.lastTimestamp) / 1000;
    this.elapsed += this.delta;
    this.lastTimestamp = now;
  }

  reset(): void {
    this.count = 0;
    this.elapsed = 0;
    this.delta = 0;
    this.lastTimestamp = null;
  }

  private static checkFrames(frames: number): number {
    if (!Number.isFinite(frames) || frames <= 0) {
      throw new RangeError(`Frame rate must be a positive number, got ${frames}`);
    }
    return frames;
  }
}
