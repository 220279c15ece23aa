import { Observable, shareReplay } from "rxjs";
import type { AppConfig } from "../config";
import type { TextCleaner } from "./core/types";
import { nullProgress, type Progress } from "./runner/progress";

export interface PipelineContext {
  songId: string;
  title: string;
  /** Raw text lines of the song's lyric sheet */
  lines: string[];
  /** Dash-separated order; document order when absent */
  orderSpec?: string;
  config: AppConfig;
  cleaner?: TextCleaner;
  progress: Progress;
  cache: Map<unknown, Observable<unknown>>;
}

export interface Node<T> {
  readonly name: string;
  resolve(ctx: PipelineContext): Observable<T>;
}

/**
 * A named pipeline node whose observable is created once per context and
 * replayed to every subscriber.
 */
export function defineNode<T>(config: {
  name: string;
  resolve: (ctx: PipelineContext) => Observable<T>;
}): Node<T> {
  const node: Node<T> = {
    name: config.name,
    resolve(ctx: PipelineContext): Observable<T> {
      const cached = ctx.cache.get(node);
      if (cached) return cached as Observable<T>;

      const obs = config.resolve(ctx).pipe(shareReplay({ bufferSize: 1, refCount: false }));
      ctx.cache.set(node, obs);
      return obs;
    },
  };
  return node;
}

export function createContext(
  songId: string,
  options: {
    title: string;
    lines: string[];
    config: AppConfig;
    orderSpec?: string;
    cleaner?: TextCleaner;
    progress?: Progress;
  }
): PipelineContext {
  return {
    songId,
    title: options.title,
    lines: options.lines,
    orderSpec: options.orderSpec,
    config: options.config,
    cleaner: options.cleaner,
    progress: options.progress ?? nullProgress,
    cache: new Map(),
  };
}

export function resolveNode<T>(node: Node<T>, ctx: PipelineContext): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let result: { value: T } | null = null;
    node.resolve(ctx).subscribe({
      next(v) {
        result = { value: v };
      },
      error: reject,
      complete() {
        if (result) resolve(result.value);
        else reject(new Error(`Node "${node.name}" completed without emitting a value`));
      },
    });
  });
}
