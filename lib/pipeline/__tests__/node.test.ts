import { describe, it, expect, vi } from "vitest";
import { lastValueFrom, toArray, Observable, of, throwError } from "rxjs";
import { defineNode, createContext, resolveNode, type PipelineContext } from "../node.js";
import { parseConfig } from "../../config.js";

function makeCtx(overrides?: Partial<PipelineContext>): PipelineContext {
  return {
    ...createContext("test-song", {
      title: "Test Song",
      lines: [],
      config: parseConfig({}),
    }),
    ...overrides,
  };
}

describe("defineNode", () => {
  it("emits every value of the resolved observable", async () => {
    const node = defineNode<string>({
      name: "test-node",
      resolve: () =>
        new Observable<string>((sub) => {
          sub.next("a");
          sub.next("b");
          sub.complete();
        }),
    });

    const result = await lastValueFrom(node.resolve(makeCtx()).pipe(toArray()));
    expect(result).toEqual(["a", "b"]);
  });

  it("memoizes the observable per context", async () => {
    let callCount = 0;

    const node = defineNode<string>({
      name: "memo-node",
      resolve: () => {
        callCount++;
        return of("value");
      },
    });

    const ctx = makeCtx();
    const obs1 = node.resolve(ctx);
    const obs2 = node.resolve(ctx);

    expect(obs1).toBe(obs2);
    expect(callCount).toBe(1);

    await lastValueFrom(obs1);
    await lastValueFrom(obs2);
    expect(callCount).toBe(1);
  });

  it("does not share memoization across different contexts", async () => {
    const resolveFn = vi.fn(() => of("value"));
    const node = defineNode<string>({ name: "per-ctx", resolve: resolveFn });

    await lastValueFrom(node.resolve(makeCtx()));
    await lastValueFrom(node.resolve(makeCtx()));

    expect(resolveFn).toHaveBeenCalledTimes(2);
  });

  it("lets a node depend on another through the context", async () => {
    const upstream = defineNode<number>({ name: "upstream", resolve: () => of(20) });
    const downstream = defineNode<number>({
      name: "downstream",
      resolve: (ctx) =>
        new Observable<number>((sub) => {
          void resolveNode(upstream, ctx).then(
            (v) => {
              sub.next(v + 1);
              sub.complete();
            },
            (err: unknown) => sub.error(err)
          );
        }),
    });

    expect(await resolveNode(downstream, makeCtx())).toBe(21);
  });
});

describe("resolveNode", () => {
  it("resolves with the last emitted value", async () => {
    const node = defineNode<string>({ name: "last", resolve: () => of("first", "second") });
    expect(await resolveNode(node, makeCtx())).toBe("second");
  });

  it("rejects with the node's error", async () => {
    const node = defineNode<string>({
      name: "broken",
      resolve: () => throwError(() => new Error("boom")),
    });
    await expect(resolveNode(node, makeCtx())).rejects.toThrow("boom");
  });

  it("rejects when the node completes without a value", async () => {
    const node = defineNode<string>({
      name: "empty",
      resolve: () => new Observable<string>((sub) => sub.complete()),
    });
    await expect(resolveNode(node, makeCtx())).rejects.toThrow(
      'Node "empty" completed without emitting a value'
    );
  });
});

describe("createContext", () => {
  it("defaults to silent progress and a fresh cache", () => {
    const ctx = makeCtx();
    expect(ctx.songId).toBe("test-song");
    expect(ctx.cache.size).toBe(0);
    expect(ctx.cleaner).toBeUndefined();
    expect(() => ctx.progress.emit({ type: "song-step-start", songId: "x", step: "sections" })).not.toThrow();
  });
});
