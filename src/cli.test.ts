import assert from "node:assert/strict";
import test from "node:test";
import { parseCliArgs, previewOccurrences, runCli, type CliIo } from "./cli.js";
import { ScheduleFileStore } from "./schedule-store.js";

function captureIo(): CliIo & { lines: string[]; errors: string[] } {
  const lines: string[] = [];
  const errors: string[] = [];
  return {
    lines,
    errors,
    out: (line) => lines.push(line),
    err: (line) => errors.push(line),
  };
}

async function createStore() {
  const now = () => new Date(2025, 0, 10, 6, 0, 0);
  const store = new ScheduleFileStore({ filePath: ":memory:", now });
  await store.load();
  return { store, now };
}

test("cli arguments split into command, positionals and flags", () => {
  assert.deepEqual(parseCliArgs(["save", "--key", "ops", "--disabled", "--time", "08:00"]), {
    command: "save",
    positional: [],
    flags: { key: "ops", disabled: "true", time: "08:00" },
    json: false,
  });
  assert.deepEqual(parseCliArgs(["show", "ops", "--json"]), {
    command: "show",
    positional: ["ops"],
    flags: { json: "true" },
    json: true,
  });
  assert.equal(parseCliArgs([]).command, "help");
  assert.throws(() => parseCliArgs(["bogus"]), /Unknown command: bogus/);
  assert.throws(() => parseCliArgs(["save", "--name"]), /Missing value for --name/);
});

test("save, list, disable and due work against the store", async () => {
  const { store, now } = await createStore();
  const io = captureIo();

  const saveArgs = parseCliArgs([
    "save",
    "--key",
    "ops",
    "--name",
    "Ops",
    "--recurrence",
    "weekly",
    "--time",
    "09:30",
    "--start",
    "2025-01-10",
  ]);
  assert.equal(runCli(saveArgs, store, io, now()), 0);
  assert.deepEqual(io.lines, ["Saved #1 [on ] ops (all, weekly at 09:30) next=2025-01-10 09:30:00 last=never run"]);

  io.lines.length = 0;
  assert.equal(runCli(parseCliArgs(["due"]), store, io, new Date(2025, 0, 10, 9, 30, 0)), 0);
  assert.deepEqual(io.lines, ["#1 [on ] ops (all, weekly at 09:30) next=2025-01-10 09:30:00 last=never run"]);

  io.lines.length = 0;
  assert.equal(runCli(parseCliArgs(["disable", "1"]), store, io, now()), 0);
  assert.deepEqual(io.lines, ["Schedule #1 disabled"]);

  io.lines.length = 0;
  runCli(parseCliArgs(["due"]), store, io, new Date(2025, 0, 10, 9, 30, 0));
  assert.deepEqual(io.lines, ["Nothing due."]);

  io.lines.length = 0;
  runCli(parseCliArgs(["list"]), store, io, now());
  assert.deepEqual(io.lines, ["#1 [off] ops (all, weekly at 09:30) next=2025-01-10 09:30:00 last=never run"]);
  store.close();
});

test("missing schedules exit non-zero", async () => {
  const { store, now } = await createStore();
  const io = captureIo();
  assert.equal(runCli(parseCliArgs(["show", "nope"]), store, io, now()), 1);
  assert.deepEqual(io.errors, ["Schedule not found: nope"]);
  assert.equal(runCli(parseCliArgs(["delete", "5"]), store, io, now()), 1);
  assert.deepEqual(io.errors, ["Schedule not found: nope", "Schedule not found: #5"]);
  assert.throws(() => runCli(parseCliArgs(["enable", "x"]), store, io, now()), /Expected a positive schedule id/);
  store.close();
});

test("preview lists upcoming occurrences", async () => {
  assert.deepEqual(previewOccurrences("every_4_days", "00:00", "2025-01-01", new Date(2025, 0, 10, 0, 0, 0), 3), [
    "2025-01-13 00:00:00",
    "2025-01-17 00:00:00",
    "2025-01-21 00:00:00",
  ]);

  const { store, now } = await createStore();
  const io = captureIo();
  const args = parseCliArgs([
    "preview",
    "--recurrence",
    "monthly",
    "--time",
    "07:00",
    "--start",
    "2025-01-31",
    "--from",
    "2025-01-30 12:00",
    "--count",
    "3",
  ]);
  assert.equal(runCli(args, store, io, now()), 0);
  assert.deepEqual(io.lines, ["2025-01-31 07:00:00\n2025-02-28 07:00:00\n2025-03-28 07:00:00"]);
  store.close();
});
