import { EnvSource } from "../env-source"

describe("EnvSource behavior", () => {
  it("returns all env vars when no prefix", async () => {
    const source = new EnvSource({ env: { DEFAULT_LOCK: "1", LOG_LEVEL: "debug" } })

    expect(await source.load()).toEqual({ DEFAULT_LOCK: "1", LOG_LEVEL: "debug" })
  })

  it("filters and strips prefix when provided", async () => {
    const env = {
      DIGILOCK_DEFAULT_LOCK: "7",
      DIGILOCK_CHARSET_FILE: "charset.json",
      PATH: "/usr/bin",
    }

    const source = new EnvSource({ env, prefix: "DIGILOCK_" })

    expect(await source.load()).toEqual({
      DEFAULT_LOCK: "7",
      CHARSET_FILE: "charset.json",
    })
  })

  it("uses injected env over process.env", async () => {
    const result = await new EnvSource({ env: { CUSTOM: "injected" } }).load()

    expect(result).toEqual({ CUSTOM: "injected" })
    expect(result).not.toHaveProperty("PATH")
  })
})
