import { UploadHooks, UploadTransport } from "../upload";
import { Uploader, UploadOrchestrator, UploadOrchestratorOptions } from "../uploadOrchestrator";
import { ProgressUpdate, ScanPolicy, StatusLevel, UploadFile, UploadResult, UploadType } from "../uploadTypes";
import { FileValidator } from "../validation";
import { jsonResponse, makeFile, scriptedFetch, textResponse } from "./support/fakeFetch";

const endpoints: Record<UploadType, string> = {
  egi: "/upload/egi",
  epp: "/upload/epp",
  utility: "/upload/utility",
  default: "/upload/default",
};

const validator = new FileValidator({
  allowedExtensions: ["png"],
  allowedMimeTypes: ["image/png"],
  maxSize: 1000,
});

const ok = (attempts = 1): UploadResult => ({
  success: true,
  error: null,
  response: { status: 200, body: { userMessage: "Stored" } },
  attempts,
});

class FakeUploader implements Uploader {
  readonly calls: string[] = [];

  constructor(private readonly respond: (file: UploadFile) => UploadResult | Promise<UploadResult> = () => ok()) {}

  async upload(file: UploadFile, _endpoint: string, _uploadType: UploadType, hooks?: UploadHooks): Promise<UploadResult> {
    this.calls.push(file.name);
    hooks?.onTransmit?.();
    return this.respond(file);
  }
}

const disabledScan: ScanPolicy = { mode: "disabled" };

function orchestratorWith(overrides: Partial<UploadOrchestratorOptions> & { uploader: Uploader }): UploadOrchestrator {
  return new UploadOrchestrator({ validator, endpoints, scanPolicy: disabledScan, ...overrides });
}

const png = (name: string): UploadFile => makeFile(name, "image/png", 10);

describe("UploadOrchestrator.enqueue()", () => {
  test("marks files failing validation as invalid", () => {
    const orchestrator = orchestratorWith({ uploader: new FakeUploader() });

    const tasks = orchestrator.enqueue([makeFile("virus.exe", "application/x-msdownload", 10), png("ok.png")], "egi");

    expect(tasks.map((task) => task.state)).toEqual(["invalid", "queued"]);
    expect(tasks[0].validationMessage).toBe("The extension exe is not allowed. Allowed extensions: png.");
    expect(tasks[1].id).toMatch(/^[0-9a-f-]{36}$/);
  });

  test("applies batch limits before per-file checks", () => {
    const orchestrator = orchestratorWith({
      uploader: new FakeUploader(),
      limits: {
        max_files: 1,
        max_file_size: 1000,
        max_total_size: 10000,
        max_file_size_formatted: "1000 B",
        max_total_size_formatted: "9.77 KB",
      },
    });

    const tasks = orchestrator.enqueue([png("a.png"), png("b.png")], "egi");

    expect(tasks.map((task) => task.state)).toEqual(["invalid", "invalid"]);
    expect(tasks[1].validationMessage).toBe("You selected 2 files. The maximum is 1.");
  });
});

describe("UploadOrchestrator.uploadAll()", () => {
  test("uploads valid files and summarizes a partial batch", async () => {
    const uploader = new FakeUploader();
    const orchestrator = orchestratorWith({ uploader });
    orchestrator.enqueue([makeFile("virus.exe", "x/y", 10), png("ok.png")], "egi");

    const summary = await orchestrator.uploadAll();

    expect(uploader.calls).toEqual(["ok.png"]);
    expect(summary).toEqual({ total: 2, finalized: 1, failed: 0, cancelled: 0, invalid: 1, outcome: "partial" });
    expect(orchestrator.getTasks()[1]).toMatchObject({ state: "finalized", attempts: 1, userMessage: "Stored" });
  });

  test("reports progress after each file", async () => {
    const progress: ProgressUpdate[] = [];
    const orchestrator = orchestratorWith({
      uploader: new FakeUploader(),
      concurrency: 1,
      onProgress: (update) => progress.push(update),
    });
    orchestrator.enqueue([png("a.png"), png("b.png")], "egi");

    const summary = await orchestrator.uploadAll();

    expect(summary.outcome).toBe("success");
    expect(progress).toEqual([
      { completed: 1, total: 2, percent: 50 },
      { completed: 2, total: 2, percent: 100 },
    ]);
  });

  test("a blocking failure stops further dispatch", async () => {
    const uploader = new FakeUploader(() => ({
      success: false,
      response: null,
      attempts: 3,
      error: { message: "Error during upload request", errorCode: "fetch_error", state: "network", blocking: "blocking" },
    }));
    const orchestrator = orchestratorWith({ uploader, concurrency: 1 });
    orchestrator.enqueue([png("a.png"), png("b.png"), png("c.png")], "egi");

    const summary = await orchestrator.uploadAll();

    expect(uploader.calls).toEqual(["a.png"]);
    expect(orchestrator.getTasks().map((task) => task.state)).toEqual(["failed", "cancelled", "cancelled"]);
    expect(summary).toEqual({ total: 3, finalized: 0, failed: 1, cancelled: 2, invalid: 0, outcome: "failure" });
  });

  test("a non-blocking failure lets the batch continue", async () => {
    const uploader = new FakeUploader((file) =>
      file.name === "a.png"
        ? { success: false, response: null, attempts: 1, error: { message: "Bad", errorCode: "invalid_file", blocking: "not" } }
        : ok()
    );
    const orchestrator = orchestratorWith({ uploader, concurrency: 1 });
    orchestrator.enqueue([png("a.png"), png("b.png")], "egi");

    const summary = await orchestrator.uploadAll();

    expect(uploader.calls).toEqual(["a.png", "b.png"]);
    expect(summary.outcome).toBe("partial");
  });
});

describe("UploadOrchestrator cancellation", () => {
  test("keeps completed results and stops a task that is mid-retry", async () => {
    const { fetchImpl, calls } = scriptedFetch([jsonResponse(200, {}), textResponse(503, "down")]);
    const transport = new UploadTransport({
      csrfToken: "test-token",
      maxRetries: 3,
      fetchImpl,
      sleep: async () => {
        orchestrator.cancel();
      },
    });
    const orchestrator = orchestratorWith({ uploader: transport, concurrency: 1 });
    orchestrator.enqueue([png("first.png"), png("second.png"), png("third.png")], "egi");

    const summary = await orchestrator.uploadAll();
    const [first, second, third] = orchestrator.getTasks();

    expect(calls).toHaveLength(2);
    expect(first.state).toBe("finalized");
    expect(second).toMatchObject({ state: "cancelled", attempts: 1 });
    expect(third.state).toBe("cancelled");
    expect(summary).toEqual({ total: 3, finalized: 1, failed: 0, cancelled: 2, invalid: 0, outcome: "cancelled" });
  });

  test("cancels a task waiting for its scan", async () => {
    const orchestrator: UploadOrchestrator = orchestratorWith({
      uploader: new FakeUploader(),
      scanPolicy: { mode: "enabled", continueOnScanError: false },
      onStatus: (message) => {
        if (message.startsWith("Scanning")) {
          setImmediate(() => orchestrator.cancel());
        }
      },
    });
    orchestrator.enqueue([png("a.png")], "egi");

    const summary = await orchestrator.uploadAll();

    expect(orchestrator.getTasks()[0].state).toBe("cancelled");
    expect(summary.outcome).toBe("cancelled");
  });
});

describe("UploadOrchestrator scan results", () => {
  const enabled = (continueOnScanError: boolean, timeoutMs?: number): ScanPolicy => ({
    mode: "enabled",
    continueOnScanError,
    timeoutMs,
  });

  test("buffers a result that arrives before the upload completes", async () => {
    const orchestrator: UploadOrchestrator = orchestratorWith({
      uploader: new FakeUploader((file) => {
        orchestrator.reportScanResult("clean", file.name);
        return ok();
      }),
      scanPolicy: enabled(false),
    });
    orchestrator.enqueue([png("a.png")], "egi");

    const summary = await orchestrator.uploadAll();

    expect(summary.outcome).toBe("success");
    expect(orchestrator.getTasks()[0]).toMatchObject({ state: "finalized", scanOutcome: "clean" });
  });

  test("finalizes once a later clean result arrives", async () => {
    const statuses: Array<[string, StatusLevel]> = [];
    const orchestrator: UploadOrchestrator = orchestratorWith({
      uploader: new FakeUploader(),
      scanPolicy: enabled(false),
      onStatus: (message, level) => {
        statuses.push([message, level]);
        if (message.startsWith("Scanning")) {
          setImmediate(() => orchestrator.reportScanResult("clean"));
        }
      },
    });
    orchestrator.enqueue([png("a.png")], "egi");

    await orchestrator.uploadAll();

    expect(statuses).toEqual([
      ["Uploading a.png...", "info"],
      ["Scanning a.png for viruses...", "info"],
      ["The file a.png is clean.", "success"],
      ["The file a.png was uploaded.", "success"],
      ["All files were uploaded.", "success"],
    ]);
  });

  test("an infected result fails the task and blocks the batch", async () => {
    const uploader = new FakeUploader((file) => {
      orchestrator.reportScanResult("infected", file.name);
      return ok();
    });
    const orchestrator: UploadOrchestrator = orchestratorWith({ uploader, scanPolicy: enabled(true), concurrency: 1 });
    orchestrator.enqueue([png("a.png"), png("b.png")], "egi");

    const summary = await orchestrator.uploadAll();
    const [first, second] = orchestrator.getTasks();

    expect(uploader.calls).toEqual(["a.png"]);
    expect(first.state).toBe("failed");
    expect(first.error).toEqual({
      message: "The file a.png is infected.",
      errorCode: "virus_found",
      state: "scan",
      blocking: "blocking",
    });
    expect(second.state).toBe("cancelled");
    expect(summary.outcome).toBe("failure");
  });

  test("a scan error finalizes with a warning when allowed", async () => {
    const statuses: Array<[string, StatusLevel]> = [];
    const orchestrator: UploadOrchestrator = orchestratorWith({
      uploader: new FakeUploader((file) => {
        orchestrator.reportScanResult("error", file.name);
        return ok();
      }),
      scanPolicy: enabled(true),
      onStatus: (message, level) => statuses.push([message, level]),
    });
    orchestrator.enqueue([png("a.png")], "egi");

    await orchestrator.uploadAll();

    expect(orchestrator.getTasks()[0]).toMatchObject({ state: "finalized", scanOutcome: "error" });
    expect(statuses).toContainEqual(["The virus scan for a.png failed. The file was kept without a scan.", "warning"]);
  });

  test("a scan timeout fails the task when scan errors are not tolerated", async () => {
    const orchestrator = orchestratorWith({ uploader: new FakeUploader(), scanPolicy: enabled(false, 5) });
    orchestrator.enqueue([png("a.png")], "egi");

    await orchestrator.uploadAll();
    const [task] = orchestrator.getTasks();

    expect(task.state).toBe("failed");
    expect(task.scanOutcome).toBe("timeout");
    expect(task.error).toEqual({
      message: "No scan result arrived for a.png in time. The virus scan for a.png failed. The file was rejected.",
      errorCode: "scan_error",
      state: "scan",
      blocking: "not",
    });
  });
});

describe("UploadOrchestrator tasks sharing a file name", () => {
  test("one named result settles every waiting task with that name", async () => {
    let waiting = 0;
    const orchestrator: UploadOrchestrator = orchestratorWith({
      uploader: new FakeUploader(),
      scanPolicy: { mode: "enabled", continueOnScanError: false },
      concurrency: 2,
      onStatus: (message) => {
        if (message.startsWith("Scanning") && ++waiting === 2) {
          setImmediate(() => {
            orchestrator.reportScanResult("clean", "a.png");
            orchestrator.reportScanResult("clean", "a.png");
          });
        }
      },
    });
    orchestrator.enqueue([png("a.png"), png("a.png")], "egi");

    const summary = await orchestrator.uploadAll();

    expect(orchestrator.getTasks().map((task) => task.state)).toEqual(["finalized", "finalized"]);
    expect(summary.outcome).toBe("success");
  });

  test("a result left over from a failed task does not reach a later task", async () => {
    let call = 0;
    const orchestrator: UploadOrchestrator = orchestratorWith({
      uploader: new FakeUploader((file) => {
        call++;
        if (call === 1) {
          orchestrator.reportScanResult("infected");
          return { success: false, response: null, attempts: 1, error: { message: "Bad", errorCode: "invalid_file", blocking: "not" } };
        }
        orchestrator.reportScanResult("clean", file.name);
        return ok();
      }),
      scanPolicy: { mode: "enabled", continueOnScanError: false },
    });

    orchestrator.enqueue([png("a.png")], "egi");
    await orchestrator.uploadAll();
    orchestrator.enqueue([png("a.png")], "egi");
    const summary = await orchestrator.uploadAll();

    const [first, second] = orchestrator.getTasks();
    expect(first).toMatchObject({ state: "failed", error: { errorCode: "invalid_file" } });
    expect(first.scanOutcome).toBeUndefined();
    expect(second).toMatchObject({ state: "finalized", scanOutcome: "clean" });
    expect(summary).toEqual({ total: 1, finalized: 1, failed: 0, cancelled: 0, invalid: 0, outcome: "success" });
  });
});

describe("UploadOrchestrator.reportUploadFailure()", () => {
  test("fails a task waiting for its scan", async () => {
    const orchestrator: UploadOrchestrator = orchestratorWith({
      uploader: new FakeUploader(),
      scanPolicy: { mode: "enabled", continueOnScanError: false },
      onStatus: (message) => {
        if (message.startsWith("Scanning")) {
          setImmediate(() => orchestrator.reportUploadFailure("a.png"));
        }
      },
    });
    orchestrator.enqueue([png("a.png")], "egi");

    const summary = await orchestrator.uploadAll();

    expect(orchestrator.getTasks()[0]).toMatchObject({
      state: "failed",
      error: {
        message: "The server could not process a.png.",
        errorCode: "upload_failed",
        state: "server",
        blocking: "not",
      },
    });
    expect(summary.outcome).toBe("failure");
  });

  test("ignores files that are not in flight", async () => {
    const orchestrator = orchestratorWith({ uploader: new FakeUploader() });
    orchestrator.enqueue([png("a.png")], "egi");
    await orchestrator.uploadAll();

    orchestrator.reportUploadFailure("a.png", "Too late");

    expect(orchestrator.getTasks()[0].state).toBe("finalized");
  });
});

describe("UploadOrchestrator across batches", () => {
  test("a cancelled batch does not cancel the next one", async () => {
    const uploader: FakeUploader = new FakeUploader((file) => {
      if (file.name === "a.png") {
        orchestrator.cancel();
      }
      return ok();
    });
    const orchestrator: UploadOrchestrator = orchestratorWith({ uploader });

    orchestrator.enqueue([png("a.png")], "egi");
    const first = await orchestrator.uploadAll();
    orchestrator.enqueue([png("b.png")], "egi");
    const second = await orchestrator.uploadAll();

    expect(first.outcome).toBe("cancelled");
    expect(uploader.calls).toEqual(["a.png", "b.png"]);
    expect(orchestrator.getTasks().map((task) => `${task.file.name}:${task.state}`)).toEqual([
      "a.png:cancelled",
      "b.png:finalized",
    ]);
    expect(second).toEqual({ total: 1, finalized: 1, failed: 0, cancelled: 0, invalid: 0, outcome: "success" });
  });

  test("a blocking failure does not halt the next batch", async () => {
    const uploader = new FakeUploader((file) =>
      file.name === "a.png"
        ? {
            success: false,
            response: null,
            attempts: 3,
            error: { message: "Error during upload request", errorCode: "fetch_error", blocking: "blocking" },
          }
        : ok()
    );
    const orchestrator = orchestratorWith({ uploader });

    orchestrator.enqueue([png("a.png")], "egi");
    await orchestrator.uploadAll();
    orchestrator.enqueue([png("b.png")], "egi");
    const summary = await orchestrator.uploadAll();

    expect(uploader.calls).toEqual(["a.png", "b.png"]);
    expect(summary.outcome).toBe("success");
  });
});
