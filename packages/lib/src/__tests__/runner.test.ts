import assert from "node:assert"
import { existsSync } from "node:fs"
import * as path from "node:path"
import { afterEach, beforeEach, describe, it } from "node:test"

import { createFingerprintCache } from "../cache.js"
import { StrataError } from "../errors.js"
import { createTaskGraph } from "../graph.js"
import { computeFingerprint } from "../internal/fingerprint.js"
import { createTaskRunner } from "../runner.js"
import { task } from "../task.js"
import type { RunResult, TaskConfig, TaskStats } from "../types.js"
import {
  createFakeSpawn,
  createMemorySink,
  createTempDir,
  nodeCommand,
  type TempDir,
} from "./helpers.js"

const t = (id: string, config: Partial<TaskConfig> = {}) =>
  task({ id, command: `echo ${id}`, ...config })

function statsOf(result: RunResult, taskId: string): TaskStats {
  const stats = result.stats.tasks.find((s) => s.id === taskId)
  assert.ok(stats, `no stats for ${taskId}`)
  return stats
}

describe("createTaskRunner", () => {
  it("never runs more commands than the worker limit", async () => {
    let inFlight = 0
    let maxInFlight = 0
    const { spawn } = createFakeSpawn((child) => {
      inFlight++
      maxInFlight = Math.max(maxInFlight, inFlight)
      setTimeout(() => {
        inFlight--
        child.finish(0)
      }, 20)
    })
    const graph = createTaskGraph(
      ["a", "b", "c", "d", "e", "f"].map((id) => t(id))
    )

    const result = await createTaskRunner(graph, {
      cache: createFingerprintCache(),
      workers: 2,
      spawn,
      output: createMemorySink(),
    }).run(graph.calculateDependencyLevels())

    assert.strictEqual(result.ok, true)
    assert.strictEqual(maxInFlight, 2)
    assert.strictEqual(result.stats.summary.completed, 6)
  })

  it("starts a level only after the previous one has finished", async () => {
    const events: string[] = []
    const delays: Record<string, number> = {
      "echo a": 60,
      "echo b": 10,
      "echo c": 10,
    }
    const { spawn } = createFakeSpawn((child) => {
      events.push(`start ${child.command}`)
      setTimeout(() => {
        events.push(`end ${child.command}`)
        child.finish(0)
      }, delays[child.command] ?? 0)
    })
    const graph = createTaskGraph([
      t("a"),
      t("b"),
      t("c", { dependencies: ["b"] }),
    ])

    const result = await createTaskRunner(graph, {
      cache: createFingerprintCache(),
      workers: 4,
      spawn,
      output: createMemorySink(),
    }).run(graph.calculateDependencyLevels())

    assert.strictEqual(result.ok, true)
    assert.deepStrictEqual(events, [
      "start echo a",
      "start echo b",
      "end echo b",
      "end echo a",
      "start echo c",
      "end echo c",
    ])
  })

  it("stops after the failing level without continue-on-failure", async () => {
    const { spawn, spawned } = createFakeSpawn((child) =>
      child.finish(child.command === "echo a" ? 1 : 0)
    )
    const graph = createTaskGraph([
      t("a"),
      t("b"),
      t("c", { dependencies: ["a"] }),
    ])
    const failed: string[] = []

    const result = await createTaskRunner(graph, {
      cache: createFingerprintCache(),
      spawn,
      output: createMemorySink(),
      onTaskFailed: (taskId) => failed.push(taskId),
    }).run(graph.calculateDependencyLevels())

    assert.strictEqual(result.ok, false)
    assert.ok(result.error instanceof StrataError)
    assert.strictEqual(result.error.code, StrataError.TaskFailed)
    assert.strictEqual(result.error.taskId, "a")
    assert.strictEqual(
      result.error.message,
      'Task "a" failed: Task "a" exited with code 1'
    )
    assert.deepStrictEqual(failed, ["a"])
    assert.deepStrictEqual(
      spawned.map((child) => child.command),
      ["echo a", "echo b"]
    )
    assert.strictEqual(statsOf(result, "a").exitCode, 1)
    assert.strictEqual(statsOf(result, "c").status, "pending")
    assert.deepStrictEqual(result.stats.summary, {
      total: 3,
      completed: 1,
      failed: 1,
      skipped: 0,
      pending: 1,
    })
  })

  it("attempts later levels with continue-on-failure", async () => {
    const { spawn, spawned } = createFakeSpawn((child) =>
      child.finish(child.command === "echo a" ? 2 : 0)
    )
    const graph = createTaskGraph([
      t("a"),
      t("b", { dependencies: ["a"] }),
      t("c", { dependencies: ["b"] }),
    ])

    const result = await createTaskRunner(graph, {
      cache: createFingerprintCache(),
      spawn,
      output: createMemorySink(),
      continueOnFailure: true,
    }).run(graph.calculateDependencyLevels())

    assert.strictEqual(result.ok, false)
    assert.strictEqual(result.error?.taskId, "a")
    assert.deepStrictEqual(
      spawned.map((child) => child.command),
      ["echo a", "echo b", "echo c"]
    )
    assert.deepStrictEqual(result.stats.summary, {
      total: 3,
      completed: 2,
      failed: 1,
      skipped: 0,
      pending: 0,
    })
  })

  it("runs tasks without inputs on every run", async () => {
    const { spawn, spawned } = createFakeSpawn()
    const graph = createTaskGraph([t("always")])
    const cache = createFingerprintCache()
    const runner = createTaskRunner(graph, {
      cache,
      spawn,
      output: createMemorySink(),
    })

    const first = await runner.run(graph.calculateDependencyLevels())
    const second = await runner.run(graph.calculateDependencyLevels())

    assert.strictEqual(spawned.length, 2)
    assert.strictEqual(statsOf(second, "always").reason, "no-inputs")
    assert.strictEqual(first.cacheChanged, false)
    assert.strictEqual(cache.size, 0)
  })

  it("writes each task's output as one block in group mode", async () => {
    const { spawn } = createFakeSpawn((child) =>
      child.finish(0, { stdout: "built\n", stderr: "1 warning\n" })
    )
    const sink = createMemorySink()
    const graph = createTaskGraph([t("build")])

    const result = await createTaskRunner(graph, {
      cache: createFingerprintCache(),
      spawn,
      output: sink,
    }).run(graph.calculateDependencyLevels())

    assert.deepStrictEqual(sink.writes, [
      { stream: "block", text: "built\n1 warning\n" },
    ])
    assert.deepStrictEqual(statsOf(result, "build").output, {
      stdout: "built\n",
      stderr: "1 warning\n",
    })
  })

  it("reports lifecycle callbacks", async () => {
    const { spawn } = createFakeSpawn()
    const graph = createTaskGraph([t("a"), t("b", { dependencies: ["a"] })])
    const events: string[] = []

    await createTaskRunner(graph, {
      cache: createFingerprintCache(),
      spawn,
      output: createMemorySink(),
      onLevelBegin: (level) => events.push(`level ${level.level}`),
      onTaskBegin: (taskId) => events.push(`begin ${taskId}`),
      onTaskComplete: (taskId, stats) =>
        events.push(`complete ${taskId} ${stats.status}`),
    }).run(graph.calculateDependencyLevels())

    assert.deepStrictEqual(events, [
      "level 0",
      "begin a",
      "complete a completed",
      "level 1",
      "begin b",
      "complete b completed",
    ])
  })

  it("rejects an invalid worker count", () => {
    assert.throws(
      () =>
        createTaskRunner(createTaskGraph([]), {
          cache: createFingerprintCache(),
          workers: 0,
        }),
      (error: unknown) =>
        error instanceof StrataError && error.code === StrataError.Config
    )
  })
})

describe("createTaskRunner with real processes", () => {
  let tmp: TempDir

  beforeEach(() => {
    tmp = createTempDir()
    tmp.write("src/input.txt", "source")
    tmp.touch("src/input.txt", 1_000)
  })

  afterEach(() => tmp.remove())

  const writeFile = (file: string, content: string) =>
    nodeCommand(
      `const fs = require('fs'); fs.mkdirSync(require('path').dirname('${file}'), { recursive: true }); fs.writeFileSync('${file}', '${content}')`
    )

  it("caches a sibling that succeeds next to a failure with continue-on-failure", async () => {
    tmp.write("src/check.txt", "rules")
    const { spawn } = createFakeSpawn((child) =>
      child.finish(child.command === "echo check" ? 1 : 0)
    )
    const graph = createTaskGraph([
      t("lint", { inputs: ["src/input.txt"] }),
      t("check", { inputs: ["src/check.txt"] }),
    ])
    const cache = createFingerprintCache()

    const result = await createTaskRunner(graph, {
      cache,
      cwd: tmp.dir,
      spawn,
      output: createMemorySink(),
      continueOnFailure: true,
    }).run(graph.calculateDependencyLevels())

    const lintFingerprint = await computeFingerprint(["src/input.txt"], {
      cwd: tmp.dir,
    })
    assert.strictEqual(result.ok, false)
    assert.strictEqual(result.error?.taskId, "check")
    assert.strictEqual(result.cacheChanged, true)
    assert.deepStrictEqual(cache.values(), [lintFingerprint])
    assert.strictEqual(statsOf(result, "lint").status, "completed")
    assert.strictEqual(statsOf(result, "lint").fingerprint, lintFingerprint)
    assert.strictEqual(statsOf(result, "check").status, "failed")
    assert.strictEqual(statsOf(result, "check").fingerprint, undefined)
  })

  it("skips a task on the second run", async () => {
    const graph = createTaskGraph([
      t("build", {
        command: writeFile("out/result.txt", "built"),
        inputs: ["src/*.txt"],
        outputs: ["out/result.txt"],
      }),
    ])
    graph.validate()
    const cache = createFingerprintCache()
    const runner = createTaskRunner(graph, {
      cache,
      cwd: tmp.dir,
      output: createMemorySink(),
    })

    const first = await runner.run(graph.calculateDependencyLevels())
    const second = await runner.run(graph.calculateDependencyLevels())

    assert.strictEqual(first.ok, true)
    assert.strictEqual(first.cacheChanged, true)
    assert.strictEqual(statsOf(first, "build").status, "completed")
    assert.strictEqual(statsOf(first, "build").reason, "missing-outputs")
    assert.strictEqual(cache.size, 1)
    assert.strictEqual(statsOf(first, "build").fingerprint, cache.values()[0])

    assert.strictEqual(second.ok, true)
    assert.strictEqual(second.cacheChanged, false)
    assert.strictEqual(statsOf(second, "build").status, "skipped")
    assert.strictEqual(statsOf(second, "build").reason, "up-to-date")
  })

  it("does not re-run a shared dependency for a second target", async () => {
    const graph = createTaskGraph([
      t("shared", {
        command: writeFile("out/shared.txt", "shared"),
        inputs: ["src/input.txt"],
        outputs: ["out/shared.txt"],
      }),
      t("first", {
        command: writeFile("out/first.txt", "first"),
        dependencies: ["shared"],
      }),
      t("second", {
        command: writeFile("out/second.txt", "second"),
        dependencies: ["shared"],
      }),
    ])
    graph.validate()
    const cache = createFingerprintCache()
    const runner = createTaskRunner(graph, {
      cache,
      cwd: tmp.dir,
      output: createMemorySink(),
    })

    const first = await runner.run(
      graph.calculateDependencyLevels(graph.getRequiredTasks("first"))
    )
    const second = await runner.run(
      graph.calculateDependencyLevels(graph.getRequiredTasks("second"))
    )

    assert.deepStrictEqual(
      first.stats.tasks.map((s) => [s.id, s.status]),
      [
        ["shared", "completed"],
        ["first", "completed"],
      ]
    )
    assert.deepStrictEqual(
      second.stats.tasks.map((s) => [s.id, s.status]),
      [
        ["shared", "skipped"],
        ["second", "completed"],
      ]
    )
  })

  it("fails a task that exceeds its timeout", async () => {
    const graph = createTaskGraph([
      t("hang", {
        command: nodeCommand("setTimeout(() => {}, 30000)"),
        timeout: 300,
      }),
    ])
    const startedAt = Date.now()

    const result = await createTaskRunner(graph, {
      cache: createFingerprintCache(),
      cwd: tmp.dir,
      output: createMemorySink(),
    }).run(graph.calculateDependencyLevels())

    assert.ok(Date.now() - startedAt < 10_000)
    assert.strictEqual(result.ok, false)
    const stats = statsOf(result, "hang")
    assert.strictEqual(stats.status, "failed")
    assert.strictEqual(stats.error?.code, StrataError.CommandTimeout)
    assert.strictEqual(stats.error?.message, 'Task "hang" timed out after 300ms')
  })

  it("applies the default timeout to tasks without one", async () => {
    const graph = createTaskGraph([
      t("hang", { command: nodeCommand("setTimeout(() => {}, 30000)") }),
    ])

    const result = await createTaskRunner(graph, {
      cache: createFingerprintCache(),
      cwd: tmp.dir,
      output: createMemorySink(),
      defaultTimeout: 300,
    }).run(graph.calculateDependencyLevels())

    assert.strictEqual(statsOf(result, "hang").error?.code, StrataError.CommandTimeout)
  })

  it("removes outputs of auto-remove tasks after caching them", async () => {
    const graph = createTaskGraph([
      t("scratch", {
        command: writeFile("tmp/scratch.txt", "scratch"),
        inputs: ["src/input.txt"],
        outputs: ["tmp/scratch.txt"],
        autoRemove: true,
      }),
    ])
    const cache = createFingerprintCache()

    const result = await createTaskRunner(graph, {
      cache,
      cwd: tmp.dir,
      output: createMemorySink(),
    }).run(graph.calculateDependencyLevels())

    assert.strictEqual(result.ok, true)
    assert.strictEqual(cache.size, 1)
    assert.strictEqual(existsSync(path.join(tmp.dir, "tmp/scratch.txt")), false)
  })
})
