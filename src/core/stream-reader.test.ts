import { Readable } from "node:stream";
import { describe, expect, it, vi } from "vitest";
import { InvalidStateError } from "../errors.js";
import { StreamReader } from "./stream-reader.js";

function createSource(): Readable {
  return new Readable({ read() {} });
}

const tick = (ms = 30) => new Promise((r) => setTimeout(r, ms));

describe("StreamReader", () => {
  describe("read", () => {
    it("returns an empty string when nothing is staged, any number of times", () => {
      const reader = new StreamReader(createSource());

      expect(reader.hasData()).toBe(false);
      expect(reader.read()).toBe("");
      expect(reader.read()).toBe("");
      reader.pump();
      expect(reader.read()).toBe("");
    });

    it("clears the slot after returning the staged chunk", () => {
      const source = createSource();
      const reader = new StreamReader(source);

      source.push("hello\n");
      reader.pump();

      expect(reader.hasData()).toBe(true);
      expect(reader.read()).toBe("hello\n");
      expect(reader.hasData()).toBe(false);
      expect(reader.read()).toBe("");
    });
  });

  describe("staging", () => {
    it("queues chunks that arrive while the slot is occupied", () => {
      const source = createSource();
      const reader = new StreamReader(source);

      source.push("a");
      reader.pump();
      source.push("b");
      reader.pump();
      source.push("c");
      reader.pump();

      expect(reader.read()).toBe("a");
      expect(reader.hasData()).toBe(false);
    });

    it("joins the overflow ahead of the next chunk once the slot frees", () => {
      const source = createSource();
      const reader = new StreamReader(source);

      source.push("a");
      reader.pump();
      source.push("b");
      reader.pump();
      source.push("c");
      reader.pump();
      reader.read();

      source.push("d");
      reader.pump();

      expect(reader.read()).toBe("bcd");
    });

    it("promotes a backlog into the slot even when no new chunk arrives", () => {
      const source = createSource();
      const reader = new StreamReader(source);

      source.push("first");
      reader.pump();
      source.push("second");
      reader.pump();
      reader.read();

      reader.pump();

      expect(reader.hasData()).toBe(true);
      expect(reader.read()).toBe("second");
    });

    it("decodes multi-byte characters split across reads", () => {
      const source = createSource();
      const reader = new StreamReader(source);
      const bytes = Buffer.from("é✓", "utf8");

      source.push(bytes.subarray(0, 1));
      reader.pump();
      expect(reader.hasData()).toBe(false);

      source.push(bytes.subarray(1));
      reader.pump();
      expect(reader.read()).toBe("é✓");
    });
  });

  describe("flush", () => {
    it("returns the staged chunk and the whole backlog in order", () => {
      const source = createSource();
      const reader = new StreamReader(source);

      source.push("1");
      reader.pump();
      source.push("2");
      reader.pump();
      source.push("3");

      expect(reader.flush()).toBe("123");
      expect(reader.hasData()).toBe(false);
      expect(reader.flush()).toBe("");
    });
  });

  describe("worker loop", () => {
    it("stages data in the background after start", async () => {
      const source = createSource();
      const reader = new StreamReader(source, { pollMs: 5 });
      reader.start();

      source.push("line1\n");
      await tick();

      expect(reader.hasData()).toBe(true);
      expect(reader.read()).toBe("line1\n");

      reader.stop();
      await reader.stopped;
    });

    it("closes the pipe once the stop request is observed", async () => {
      const source = createSource();
      const reader = new StreamReader(source, { pollMs: 5 });
      reader.start();

      reader.stop();
      expect(reader.isStopRequested).toBe(true);
      await reader.stopped;

      expect(source.destroyed).toBe(true);
    });

    it("keeps staged data readable after stopping", async () => {
      const source = createSource();
      const reader = new StreamReader(source, { pollMs: 5 });
      reader.start();
      source.push("late");
      await tick();

      reader.stop();
      await reader.stopped;

      expect(reader.read()).toBe("late");
    });

    it("rejects a second start", () => {
      const reader = new StreamReader(createSource(), { pollMs: 5 });
      reader.start();

      expect(() => reader.start()).toThrow(InvalidStateError);
      reader.stop();
    });

    it("closes immediately when stopped before starting, and cannot start afterwards", async () => {
      const source = createSource();
      const reader = new StreamReader(source);

      reader.stop();
      await reader.stopped;

      expect(source.destroyed).toBe(true);
      expect(() => reader.start()).toThrow("stopped before it started");
    });

    it("swallows pipe errors after logging them", async () => {
      const source = createSource();
      const debug = vi.fn();
      const logger = { debug, info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const reader = new StreamReader(source, { pollMs: 5, name: "stderr", logger });
      reader.start();

      source.destroy(new Error("EPIPE"));
      await tick();
      reader.stop();
      await reader.stopped;

      expect(debug).toHaveBeenCalledWith(
        "Pipe error",
        expect.objectContaining({ stream: "stderr" }),
      );
    });

    it("loses nothing when the consumer is much slower than the producer", async () => {
      const source = createSource();
      const reader = new StreamReader(source, { pollMs: 5 });
      reader.start();

      const expected = Array.from({ length: 30 }, (_, i) => `chunk-${i};`).join("");
      let received = "";

      let written = 0;
      const producer = setInterval(() => {
        source.push(`chunk-${written};`);
        written++;
        if (written === 30) clearInterval(producer);
      }, 10);
      const consumer = setInterval(() => {
        received += reader.read();
      }, 100);

      await vi.waitFor(() => expect(written).toBe(30), { timeout: 5_000, interval: 20 });
      await tick(120);
      clearInterval(consumer);
      reader.stop();
      await reader.stopped;
      received += reader.flush();

      expect(received).toBe(expected);
    });
  });

  it("rejects a non-positive poll interval", () => {
    expect(() => new StreamReader(createSource(), { pollMs: 0 })).toThrow(RangeError);
  });
});
