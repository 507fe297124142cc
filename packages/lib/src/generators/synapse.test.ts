/**
 * Synapse generator.
 *
 * The generate container is faked: the runner writes the two files the
 * real image would produce into the mounted data directory.
 */
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import YAML from "yaml";
import { generateSynapse, synapseGenerateArgs } from "./synapse.ts";
import { MANAGED_MARKER } from "../yaml.ts";
import { createGeneratorContext, createTestRunner, makeWorkDir } from "../test-utils.ts";
import type { TestRunner } from "../test-utils.ts";

const GENERATED_HOMESERVER = `# Configuration file for Synapse.

server_name: "127.0.0.1"
pid_file: /data/homeserver.pid
listeners:
  - port: 8008
    tls: false
    type: http
    x_forwarded: true
    bind_addresses: ['::1', '127.0.0.1']
    resources:
      - names: [client, federation]
        compress: false
database:
  name: sqlite3
  args:
    database: /data/homeserver.db
log_config: "/data/127.0.0.1.log.config"
media_store_path: /data/media_store
registration_shared_secret: "test-secret"
report_stats: false
macaroon_secret_key: "test-secret"
form_secret: "test-secret"
signing_key_path: "/data/127.0.0.1.signing.key"
trusted_key_servers:
  - server_name: "matrix.org"
`;

const GENERATED_LOG_CONFIG = `version: 1
formatters:
  precise:
    format: '%(asctime)s - %(name)s - %(levelname)s - %(message)s'
handlers:
  file:
    class: logging.handlers.TimedRotatingFileHandler
    formatter: precise
    filename: /homeserver.log
root:
  level: INFO
  handlers: [file]
`;

let workDir: string;
let cleanup: () => void;

beforeEach(() => {
  ({ workDir, cleanup } = makeWorkDir());
});

afterEach(() => cleanup());

function synapseDir(): string {
  return join(workDir, "synapse");
}

/** A runner whose `run` writes what `--generate-config` would. */
function generatingRunner(): TestRunner {
  return createTestRunner((argv) => {
    if (argv[1] !== "run") return;
    writeFileSync(join(synapseDir(), "homeserver.yaml"), GENERATED_HOMESERVER);
    writeFileSync(join(synapseDir(), "127.0.0.1.log.config"), GENERATED_LOG_CONFIG);
  });
}

function readHomeserver(): Record<string, unknown> {
  return YAML.parse(readFileSync(join(synapseDir(), "homeserver.yaml"), "utf8"));
}

describe("generateSynapse", () => {
  it("runs the image's generate mode with the data directory mounted", async () => {
    const runner = generatingRunner();
    await generateSynapse(createGeneratorContext(workDir, {}, { runner, platform: "docker" }));

    expect(runner.calls.map((call) => call.argv)).toEqual([
      [
        "docker",
        "run",
        "--rm",
        "--entrypoint",
        "/bin/bash",
        "--volume",
        `${synapseDir()}:/data:Z`,
        "ghcr.io/element-hq/synapse:latest",
        "-c",
        "python3 -m synapse.app.homeserver --config-path /data/homeserver.yaml --data-directory /data --generate-config --report-stats no --server-name 127.0.0.1",
      ],
    ]);
  });

  it("applies every homeserver patch", async () => {
    const ctx = createGeneratorContext(workDir, {}, { runner: generatingRunner(), platform: "docker" });
    const result = await generateSynapse(ctx);

    expect(result.status).toBe("written");
    const homeserver = readHomeserver();
    expect(homeserver.listeners).toEqual([
      {
        port: 8448,
        tls: false,
        type: "http",
        x_forwarded: true,
        resources: [{ names: ["client", "federation"], compress: false }],
        bind_addresses: ["0.0.0.0"],
      },
    ]);
    expect(homeserver.database).toEqual({
      name: "psycopg2",
      args: { database: "synapse", cp_max: 10, cp_min: 5, host: "postgres", password: "password", user: "synapse" },
    });
    expect(homeserver.enable_registration).toBe(true);
    expect(homeserver.enable_registration_without_verification).toBe(true);
    expect(homeserver.log_config).toBe("/data/log.config.yaml");
    expect(homeserver.password_config).toEqual({ pepper: "s3cr3tP3pp3r" });
    expect(homeserver.presence).toEqual({ enabled: true });
    expect(homeserver.suppress_key_server_warning).toBe(true);
    expect(homeserver.trusted_key_servers).toEqual([{ server_name: "matrix.org", accept_keys_insecurely: true }]);
    expect(homeserver.user_directory).toEqual({ enabled: true, prefer_local_users: true, search_all_users: true });
    expect(homeserver.app_service_config_files).toBeUndefined();
    expect(homeserver.experimental_features).toBeUndefined();
  });

  it("renames and patches the log config", async () => {
    await generateSynapse(createGeneratorContext(workDir, {}, { runner: generatingRunner(), platform: "docker" }));

    expect(existsSync(join(synapseDir(), "127.0.0.1.log.config"))).toBe(false);
    const text = readFileSync(join(synapseDir(), "log.config.yaml"), "utf8");
    expect(text.split("\n")[0]).toBe(`# ${MANAGED_MARKER}`);
    expect(YAML.parse(text).handlers.file.filename).toBe("/data/homeserver.log");
  });

  it("follows the presence flag", async () => {
    await generateSynapse(
      createGeneratorContext(workDir, { synapseEnablePresence: "false" }, { runner: generatingRunner(), platform: "docker" })
    );
    expect(readHomeserver().presence).toEqual({ enabled: false });
  });

  it("registers hookshot as an application service", async () => {
    await generateSynapse(
      createGeneratorContext(workDir, { enableHookshot: "true" }, { runner: generatingRunner(), platform: "docker" })
    );
    const homeserver = readHomeserver();
    expect(homeserver.app_service_config_files).toEqual(["/appservices/hookshot.yaml"]);
    expect(homeserver.experimental_features).toBeUndefined();
  });

  it("enables the appservice encryption features for hookshot encryption", async () => {
    await generateSynapse(
      createGeneratorContext(
        workDir,
        { enableHookshot: "true", hookshotEncryption: "true", enableMas: "false" },
        { runner: generatingRunner(), platform: "docker" }
      )
    );
    expect(readHomeserver().experimental_features).toEqual({
      msc2409_to_device_messages_enabled: true,
      msc3202_device_masquerading: true,
      msc3202_transaction_extensions: true,
    });
  });

  it("fixes ownership before and after generation under podman", async () => {
    const runner = generatingRunner();
    await generateSynapse(createGeneratorContext(workDir, {}, { runner }));
    expect(runner.calls.map((call) => call.argv[1])).toEqual([
      "unshare",
      "unshare",
      "unshare",
      "run",
      "unshare",
      "unshare",
      "unshare",
    ]);
  });

  it("keeps existing files when the overwrite is declined", async () => {
    mkdirSync(synapseDir(), { recursive: true });
    writeFileSync(join(synapseDir(), "homeserver.yaml"), "server_name: kept\n");
    const runner = generatingRunner();

    const result = await generateSynapse(createGeneratorContext(workDir, {}, { runner, answers: ["n"] }));

    expect(result.status).toBe("skipped");
    expect(readFileSync(join(synapseDir(), "homeserver.yaml"), "utf8")).toBe("server_name: kept\n");
    expect(runner.calls).toHaveLength(0);
  });

  it("reports a container that produced no config", async () => {
    const ctx = createGeneratorContext(workDir, {}, { platform: "docker" });
    await expect(generateSynapse(ctx)).rejects.toMatchObject({ code: "generate_failed" });
  });

  it("propagates the runtime's exit status", async () => {
    const runner = createTestRunner(() => ({ exitCode: 125, stderr: "image not known" }));
    await expect(generateSynapse(createGeneratorContext(workDir, {}, { runner, platform: "docker" }))).rejects.toMatchObject({
      code: "command_failed",
      exitStatus: 125,
    });
  });
});

describe("synapseGenerateArgs", () => {
  it("passes the configured server name", () => {
    const args = synapseGenerateArgs(createGeneratorContext(workDir, { serverName: "matrix.test" }).config);
    expect(args.at(-1)).toMatch(/--server-name matrix\.test$/);
  });
});
