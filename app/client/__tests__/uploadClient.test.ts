import { RecordingLogger } from "../../../engine/__tests__/support/recordingLogger";
import { UploadClient } from "../uploadClient";
import { StatusLevel } from "../uploadTypes";
import { jsonResponse, makeFile, scriptedFetch } from "./support/fakeFetch";
import { FakeConnector } from "./support/fakeRealtime";

const configBody = {
  currentLang: "en",
  availableLangs: ["en"],
  translations: { upload_success: "Saved :fileName." },
  envMode: "testing",
  allowedExtensions: ["png"],
  allowedMimeTypes: ["image/png"],
  maxSize: 1024,
  uploadTypePaths: { "/uploading/egi": "egi" },
  uploadEndpoints: { egi: "/upload/egi", epp: "/upload/epp", utility: "/upload/utility", default: "/upload/default" },
  defaultUploadType: "default",
};

const limitsBody = {
  max_files: 5,
  max_file_size: 1024,
  max_total_size: 10240,
  max_file_size_formatted: "1 KB",
  max_total_size_formatted: "10 KB",
  size_margin: 1.1,
};

describe("UploadClient", () => {
  test("uploads to the endpoint of the page's upload type", async () => {
    const { fetchImpl, calls } = scriptedFetch([
      jsonResponse(200, configBody),
      jsonResponse(200, limitsBody),
      jsonResponse(200, {}),
    ]);
    const statuses: Array<[string, StatusLevel]> = [];

    const client = await UploadClient.create({
      csrfToken: "test-token",
      pathname: "/uploading/egi",
      scanPolicy: { mode: "disabled" },
      fetchImpl,
      onStatus: (message, level) => statuses.push([message, level]),
    });
    client.select([makeFile("a.png", "image/png", 10)]);
    const summary = await client.upload();

    expect(client.uploadType).toBe("egi");
    expect(calls.map((call) => call.url)).toEqual(["/api/config", "/api/system/upload-limits", "/upload/egi"]);
    expect(summary.outcome).toBe("success");
    expect(statuses).toContainEqual(["Saved a.png.", "success"]);
  });

  test("routes real-time scan results to the waiting task", async () => {
    const connector = new FakeConnector();
    const { fetchImpl } = scriptedFetch([
      jsonResponse(200, configBody),
      jsonResponse(200, limitsBody),
      () => {
        connector.channel.emit("TestUploadEvent12345", {
          state: "allFileScannedSomeInfected",
          message: "Infected file found",
          fileName: "a.png",
        });
        return jsonResponse(200, {});
      },
    ]);
    const statuses: Array<[string, StatusLevel]> = [];

    const client = await UploadClient.create({
      csrfToken: "test-token",
      pathname: "/somewhere",
      scanPolicy: { mode: "enabled", continueOnScanError: false },
      connector,
      fetchImpl,
      onStatus: (message, level) => statuses.push([message, level]),
    });

    expect(client.startListening()).toBe(true);
    client.select([makeFile("a.png", "image/png", 10)]);
    const summary = await client.upload();
    client.dispose();

    expect(client.getTasks()[0]).toMatchObject({ state: "failed", scanOutcome: "infected" });
    expect(statuses).toContainEqual(["Infected file found", "warning"]);
    expect(summary.outcome).toBe("failure");
    expect(connector.unsubscribed).toEqual(["upload"]);
  });

  test("an uploadFailed event fails the task waiting for its scan", async () => {
    const connector = new FakeConnector();
    const { fetchImpl } = scriptedFetch([jsonResponse(200, configBody), jsonResponse(200, limitsBody), jsonResponse(200, {})]);

    const client = await UploadClient.create({
      csrfToken: "test-token",
      pathname: "/uploading/egi",
      scanPolicy: { mode: "enabled", continueOnScanError: false },
      connector,
      fetchImpl,
      onStatus: (message) => {
        if (message.startsWith("Scanning")) {
          setImmediate(() =>
            connector.channel.emit("TestUploadEvent12345", {
              state: "uploadFailed",
              message: "Storage failed",
              fileName: "a.png",
            })
          );
        }
      },
    });

    client.startListening();
    client.select([makeFile("a.png", "image/png", 10)]);
    const summary = await client.upload();

    expect(client.getTasks()[0]).toMatchObject({
      state: "failed",
      error: { message: "Storage failed", errorCode: "upload_failed", state: "server", blocking: "not" },
    });
    expect(summary.outcome).toBe("failure");
  });

  test("uploads without scan results when no real-time connector exists", async () => {
    const logger = new RecordingLogger();
    const { fetchImpl } = scriptedFetch([jsonResponse(200, configBody), jsonResponse(200, limitsBody), jsonResponse(200, {})]);

    const client = await UploadClient.create({
      csrfToken: "test-token",
      pathname: "/uploading/egi",
      scanPolicy: { mode: "enabled", continueOnScanError: false },
      connector: null,
      fetchImpl,
      logger,
    });

    client.select([makeFile("a.png", "image/png", 10)]);
    const summary = await client.upload();

    expect(client.getTasks()[0].state).toBe("finalized");
    expect(summary.outcome).toBe("success");
    expect(logger.at("warning").map((record) => record.message)).toContain(
      "Realtime updates unavailable, uploads continue without scan results"
    );
    expect(client.startListening()).toBe(false);
  });
});
