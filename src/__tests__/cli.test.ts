import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, writeFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { stringify } from "yaml";
import { runCli } from "../cli.js";
import type { EnvLookup } from "../config/expand-env.js";

function makeIO(env: EnvLookup = {}) {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    io: {
      stdout: (text: string) => {
        out.push(text);
      },
      stderr: (text: string) => {
        err.push(text);
      },
      env,
      version: "0.0.0-test",
    },
  };
}

describe("cli", () => {
  let dir: string;
  let configPath: string;
  let resolvPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "hostprobe-cli-"));
    configPath = join(dir, "hostprobe.yaml");
    resolvPath = join(dir, "resolv.conf");
    await writeFile(
      configPath,
      stringify({ resolver: { primaryPath: resolvPath, redirectedPath: join(dir, "none.conf") } }),
      "utf-8"
    );
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("lists nameservers", async () => {
    await writeFile(resolvPath, "nameserver 8.8.8.8\nnameserver 2001:db8::1\n", "utf-8");
    const { io, out } = makeIO();

    const code = await runCli(["-c", configPath, "nameservers"], io);

    expect(code).toBe(0);
    expect(out.join("")).toBe("IPv4 8.8.8.8\nIPv6 2001:db8::1\n");
  });

  it("prints nothing for the redirected source when it is absent", async () => {
    await writeFile(resolvPath, "nameserver 8.8.8.8\n", "utf-8");
    const { io, out } = makeIO();

    const code = await runCli(["-c", configPath, "nameservers", "--redirected"], io);

    expect(code).toBe(0);
    expect(out).toEqual([]);
  });

  it("selects the single configured nameserver", async () => {
    await writeFile(resolvPath, "nameserver 9.9.9.9\n", "utf-8");
    const { io, out } = makeIO();

    expect(await runCli(["-c", configPath, "nameserver"], io)).toBe(0);
    expect(out.join("")).toBe("IPv4 9.9.9.9\n");
  });

  it("selects the loopback fallback without nameservers", async () => {
    const { io, out } = makeIO();

    expect(await runCli(["-c", configPath, "nameserver"], io)).toBe(0);
    expect(out.join("")).toBe("IPv4 127.0.0.1\n");
  });

  it("writes debug output with repeated -v", async () => {
    await writeFile(resolvPath, "nameserver 9.9.9.9\n", "utf-8");
    const { io, err } = makeIO();

    await runCli(["-c", configPath, "-v", "-v", "nameservers"], io);

    expect(err).toEqual([`Found DNS servers in ${resolvPath}: ["9.9.9.9"]\r\n`]);
  });

  it("prints the subprocess environment", async () => {
    const { io, out } = makeIO({ PATH: "/opt/tools" });

    expect(await runCli(["env"], io)).toBe(0);
    expect(out.join("")).toBe("PATH=/opt/tools:/bin:/usr/bin:/sbin:/usr/sbin\nLC_ALL=C\n");
  });

  it("reports loopback as local", async () => {
    const { io, out } = makeIO();

    expect(await runCli(["is-local", "127.0.0.1"], io)).toBe(0);
    expect(out.join("")).toBe("local\n");
  });

  it("rejects text that is not an address", async () => {
    const { io, out, err } = makeIO();

    expect(await runCli(["is-local", "not-an-ip"], io)).toBe(2);
    expect(out).toEqual([]);
    expect(err).toEqual(["Not an IP address: not-an-ip\r\n"]);
  });

  it("exits 1 when which finds nothing", async () => {
    const { io, out } = makeIO({ PATH: dir });

    expect(await runCli(["which", "hostprobe-missing-tool"], io)).toBe(1);
    expect(out).toEqual([]);
  });

  it("maps a missing config file to the fatal exit code", async () => {
    const missing = join(dir, "missing.yaml");
    const { io, err } = makeIO();

    expect(await runCli(["-c", missing, "env"], io)).toBe(99);
    expect(err).toEqual([`hostprobe: fatal: Config file not found: ${missing}\r\n`]);
  });

  it("takes the config path from HOSTPROBE_CONFIG_PATH", async () => {
    await writeFile(resolvPath, "nameserver 1.0.0.1\n", "utf-8");
    const { io, out } = makeIO({ HOSTPROBE_CONFIG_PATH: configPath });

    expect(await runCli(["nameservers"], io)).toBe(0);
    expect(out.join("")).toBe("IPv4 1.0.0.1\n");
  });

  it("prints the version", async () => {
    const { io, out } = makeIO();

    expect(await runCli(["--version"], io)).toBe(0);
    expect(out.join("")).toBe("0.0.0-test\n");
  });
});
