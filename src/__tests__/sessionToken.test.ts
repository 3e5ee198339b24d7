import jwt from "jsonwebtoken";
import { signSessionToken, verifySessionToken } from "../utils/helpers/generateToken";
import { testConfig } from "./helpers/testEnv";

describe("session tokens", () => {
  const config = testConfig("/tmp/app-tracker-tokens");

  it("round-trips the session user", () => {
    const token = signSessionToken(config, { username: "demo", role: "user" });

    expect(verifySessionToken(config, token)).toEqual({ username: "demo", role: "user" });
  });

  it("reports expired tokens", () => {
    const token = jwt.sign(
      { username: "demo", role: "user", exp: Math.floor(Date.now() / 1000) - 60 },
      config.jwt.secret,
    );

    expect(() => verifySessionToken(config, token)).toThrow("Session expired");
  });

  it("rejects foreign signatures and unknown roles", () => {
    const foreign = jwt.sign({ username: "demo", role: "user" }, "other-secret");
    const unknownRole = jwt.sign({ username: "demo", role: "root" }, config.jwt.secret);

    expect(() => verifySessionToken(config, foreign)).toThrow("Invalid session token");
    expect(() => verifySessionToken(config, unknownRole)).toThrow("Invalid session token");
  });
});
