import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("emits the message at the requested level", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.warn("cause chain truncated")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.level).toBe("warn")
      expect(logs[0]?.msg).toBe("cause chain truncated")
    })

    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const run = logger.child({ workflowId: "wf-1" })
      const attempt = run.child({ activityId: "act-1" })

      attempt.info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({
        workflowId: "wf-1",
        activityId: "act-1",
      })
    })

    it("child() does not mutate the parent", () => {
      const { logger, read } = h.make({ level: "trace" })

      const run = logger.child({ workflowId: "wf-1" })
      const attempt = run.child({ activityId: "act-1" })

      run.info("parent")
      attempt.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).toMatchObject({ workflowId: "wf-1" })
      expect(logs[0]?.payload).not.toHaveProperty("activityId")
      expect(logs[1]?.payload).toMatchObject({ workflowId: "wf-1", activityId: "act-1" })
    })

    it("per-call meta is included in the entry", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ module: "failure-converter" }).debug("decoded", { depth: 3 })

      const logs = read()

      expect(logs[0]?.payload).toMatchObject({ module: "failure-converter", depth: 3 })
    })

    it("level filtering: logs below configured minimum are suppressed", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      const levels = read().map((l) => l.level)

      expect(levels).toEqual(["warn", "error"])
    })
  })
}
