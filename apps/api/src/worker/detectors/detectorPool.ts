import { getLogger, toErrorPayload } from "../../shared/logger";
import type { DetectorFactory, PoseDetector } from "../../shared/types/detector";

const logger = getLogger("detector-pool", "pipeline");

type Waiter = {
  resolve: (detector: PoseDetector) => void;
  reject: (error: Error) => void;
};

export type DetectorPoolStats = {
  size: number;
  idle: number;
  waiting: number;
};

/**
 * Fixed set of detector instances handed out one request at a time. A
 * detector is reset before it goes back to the pool, so no request sees
 * state left behind by another.
 */
export class DetectorPool {
  private readonly detectors: PoseDetector[] = [];

  private readonly idle: PoseDetector[] = [];

  private readonly waiters: Waiter[] = [];

  private initializing: Promise<void> | null = null;

  private disposed = false;

  constructor(
    private readonly factory: DetectorFactory,
    private readonly size: number,
  ) {
    if (!Number.isInteger(size) || size < 1) {
      throw new Error(`Detector pool size must be a positive integer: ${size}`);
    }
  }

  initialize(): Promise<void> {
    if (this.disposed) {
      return Promise.reject(new Error("Detector pool has been disposed"));
    }

    this.initializing ??= this.createDetectors().catch((error: unknown) => {
      this.initializing = null;
      throw error;
    });
    return this.initializing;
  }

  private async createDetectors(): Promise<void> {
    const created = Array.from({ length: this.size }, () => this.factory());

    try {
      await Promise.all(created.map((detector) => detector.initialize()));
    } catch (error) {
      logger.error("Detector initialisation failed", {
        error: toErrorPayload(error),
      });
      await Promise.allSettled(created.map((detector) => detector.dispose()));
      throw error;
    }

    this.detectors.push(...created);
    this.idle.push(...created);
    logger.info("Detector pool ready", {
      size: this.size,
      detector: created[0]?.name,
    });
  }

  async acquire(): Promise<PoseDetector> {
    await this.initialize();

    const detector = this.idle.pop();
    if (detector) {
      return detector;
    }

    return new Promise<PoseDetector>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  async release(detector: PoseDetector): Promise<void> {
    if (this.disposed) {
      return;
    }
    if (!this.detectors.includes(detector)) {
      throw new Error("Detector does not belong to this pool");
    }

    try {
      await detector.reset();
    } catch (error) {
      logger.warn("Detector reset failed", {
        detector: detector.name,
        error: toErrorPayload(error),
      });
    }

    // dispose() may have run while the reset was pending.
    if (this.disposed) {
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(detector);
      return;
    }
    this.idle.push(detector);
  }

  async withDetector<T>(task: (detector: PoseDetector) => Promise<T>): Promise<T> {
    const detector = await this.acquire();
    try {
      return await task(detector);
    } finally {
      await this.release(detector);
    }
  }

  getStats(): DetectorPoolStats {
    return {
      size: this.detectors.length,
      idle: this.idle.length,
      waiting: this.waiters.length,
    };
  }

  async dispose(): Promise<void> {
    this.disposed = true;

    const pending = this.waiters.splice(0);
    pending.forEach((waiter) => {
      waiter.reject(new Error("Detector pool has been disposed"));
    });

    const detectors = this.detectors.splice(0);
    this.idle.splice(0);
    const results = await Promise.allSettled(
      detectors.map((detector) => detector.dispose()),
    );
    results.forEach((result) => {
      if (result.status === "rejected") {
        logger.warn("Detector dispose failed", {
          error: toErrorPayload(result.reason),
        });
      }
    });
  }
}
