import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import YAML from "yaml";
import { generateMas, stripLogLines } from "./mas.ts";
import { MANAGED_MARKER } from "../yaml.ts";
import { createGeneratorContext, createTestRunner, makeWorkDir } from "../test-utils.ts";
import type { TestRunner } from "../test-utils.ts";

const GENERATE_OUTPUT = `2026-01-01T00:00:00.000000Z  INFO mas_cli::commands::config: Generating keys...
http:
  listeners:
  - name: web
    resources:
    - name: discovery
    - name: human
    - name: oauth
    - name: compat
    binds:
    - address: '[::]:8080'
    proxy_protocol: false
  - name: internal
    resources:
    - name: health
    binds:
    - host: localhost
      port: 8081
  trusted_proxies:
  - 192.168.0.0/16
  - 10.0.0.0/8
  public_base: http://[::]:8080/
  issuer: http://[::]:8080/
database:
  uri: postgresql://
  max_connections: 10
email:
  from: '"Authentication Service" <root@localhost>'
  reply_to: '"Authentication Service" <root@localhost>'
  transport: blackhole
secrets:
  encryption: test-secret
passwords:
  enabled: true
  minimum_complexity: 3
matrix:
  kind: synapse
  homeserver: localhost:8008
  secret: test-secret
  endpoint: http://localhost:8008/
`;

let workDir: string;
let cleanup: () => void;

beforeEach(() => {
  ({ workDir, cleanup } = makeWorkDir());
});

afterEach(() => cleanup());

function masRunner(): TestRunner {
  return createTestRunner((argv) => (argv[1] === "run" ? { stdout: GENERATE_OUTPUT } : undefined));
}

function readMasConfig(): Record<string, unknown> {
  return YAML.parse(readFileSync(join(workDir, "masConfig.yaml"), "utf8"));
}

describe("stripLogLines", () => {
  it("drops lines carrying INFO", () => {
    expect(stripLogLines("a: 1\n2026 INFO starting\nb: 2")).toBe("a: 1\nb: 2");
  });
});

describe("generateMas", () => {
  it("skips entirely while MAS is disabled", async () => {
    const runner = masRunner();
    const result = await generateMas(createGeneratorContext(workDir, { enableMas: "false" }, { runner }));
    expect(result.status).toBe("disabled");
    expect(runner.calls).toHaveLength(0);
  });

  it("runs config generate in a throwaway container", async () => {
    const runner = masRunner();
    await generateMas(createGeneratorContext(workDir, {}, { runner }));
    expect(runner.calls.map((call) => call.argv)).toEqual([
      ["podman", "run", "--rm", "ghcr.io/element-hq/matrix-authentication-service:latest", "config", "generate"],
    ]);
  });

  it("patches the generated config for the local topology", async () => {
    await generateMas(createGeneratorContext(workDir, {}, { runner: masRunner() }));

    const text = readFileSync(join(workDir, "masConfig.yaml"), "utf8");
    expect(text.split("\n")[0]).toBe(`# ${MANAGED_MARKER}`);
    expect(text).not.toContain("Generating keys");

    const mas = YAML.parse(text);
    expect(mas.http.issuer).toBe("http://127.0.0.15:8080");
    expect(mas.http.public_base).toBe("http://127.0.0.15:8080");
    expect(mas.http.trusted_proxies).toEqual(["0.0.0.0/0"]);
    expect(mas.http.listeners[0].binds).toEqual([{ host: "0.0.0.0", port: 8080 }]);
    expect(mas.http.listeners[0].resources.map((resource: { name: string }) => resource.name)).toEqual([
      "discovery",
      "human",
      "oauth",
      "compat",
      "adminapi",
    ]);
    expect(mas.http.listeners[1].binds).toEqual([{ host: "localhost", port: 8081 }]);
    expect(mas.database).toEqual({ database: "mas", host: "mas-postgres", password: "password", port: 5432, username: "mas" });
    expect(mas.clients).toEqual([
      { client_auth_method: "client_secret_basic", client_id: "0000000000000000000SYNAPSE", client_secret: "secret" },
      {
        client_auth_method: "client_secret_post",
        client_id: "01JTTHHQBMKE8W3VCXRVFVW04P",
        client_secret: "secret",
        redirect_uris: ["http://127.0.0.15:8080/api/doc/oauth2-callback"],
      },
    ]);
    expect(mas.matrix).toEqual({ kind: "synapse", homeserver: "127.0.0.1", secret: "secret", endpoint: "http://synapse:8448/" });
    expect(mas.passwords).toEqual({ enabled: true, minimum_complexity: 0 });
    expect(mas.account).toEqual({ password_registration_enabled: true });
    expect(mas.experimental).toEqual({
      access_token_ttl: 86400,
      compat_token_ttl: 86400,
      inactive_session_expiration: { expire_compat_sessions: false, ttl: 86400 },
    });
    expect(mas.policy).toEqual({
      client_registration: { allow_host_mismatch: true, allow_insecure_uris: true, allow_missing_client_uri: true },
      data: { admin_clients: ["0000000000000000000SYNAPSE", "01JTTHHQBMKE8W3VCXRVFVW04P"], admin_users: ["admin"] },
    });
  });

  it("sends mail through mailhog when it is enabled", async () => {
    await generateMas(createGeneratorContext(workDir, { serverName: "matrix.test" }, { runner: masRunner() }));
    expect(readMasConfig().email).toEqual({
      from: "mas@matrix.test",
      reply_to: "mas@matrix.test",
      transport: "smtp",
      hostname: "mailhog",
      mode: "plain",
      port: 1025,
    });
  });

  it("keeps the generated email block without mailhog", async () => {
    await generateMas(createGeneratorContext(workDir, { enableMailhog: "false" }, { runner: masRunner() }));
    expect(readMasConfig().email).toEqual({
      from: '"Authentication Service" <root@localhost>',
      reply_to: '"Authentication Service" <root@localhost>',
      transport: "blackhole",
    });
  });

  it("delegates synapse authentication to MAS", async () => {
    mkdirSync(join(workDir, "synapse"), { recursive: true });
    const homeserverFile = join(workDir, "synapse", "homeserver.yaml");
    writeFileSync(homeserverFile, "server_name: 127.0.0.1\nenable_registration: true\n");

    const result = await generateMas(createGeneratorContext(workDir, {}, { runner: masRunner() }));

    expect(result.files).toEqual([join(workDir, "masConfig.yaml"), homeserverFile]);
    expect(YAML.parse(readFileSync(homeserverFile, "utf8"))).toEqual({
      server_name: "127.0.0.1",
      enable_registration: false,
      matrix_authentication_service: { enabled: true, endpoint: "http://mas:8080/", secret: "secret" },
    });
  });

  it("keeps the existing file when the overwrite is declined", async () => {
    mkdirSync(workDir);
    writeFileSync(join(workDir, "masConfig.yaml"), "http: {}\n");
    const runner = masRunner();

    const result = await generateMas(createGeneratorContext(workDir, {}, { runner, answers: ["N"] }));

    expect(result.status).toBe("skipped");
    expect(readFileSync(join(workDir, "masConfig.yaml"), "utf8")).toBe("http: {}\n");
    expect(runner.calls).toHaveLength(0);
  });
});
