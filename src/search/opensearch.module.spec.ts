import { parseBasicAuth } from "./opensearch.module";

describe("parseBasicAuth", () => {
  it("splits user and password at the first colon", () => {
    expect(parseBasicAuth("admin:s3:cr:et")).toEqual({
      username: "admin",
      password: "s3:cr:et",
    });
  });

  it("accepts a user without a password", () => {
    expect(parseBasicAuth("admin")).toEqual({ username: "admin", password: "" });
  });

  it("returns no credentials when unset", () => {
    expect(parseBasicAuth(undefined)).toBeUndefined();
    expect(parseBasicAuth("")).toBeUndefined();
  });
});
