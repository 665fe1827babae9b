/// <reference types="jest" />

import { ValidationError } from "@/lib/errors";
import {
  extractCapturedUrl,
  extractDomain,
  findUrl,
  isPrivateHost,
  isPublicHttpUrl,
  isTrackingParam,
  normalizeUrl,
  parseShareDeepLink,
  validateUrl,
} from "@/lib/link-url";

describe("normalizeUrl", () => {
  it("treats tracking params, www and trailing slashes as the same link", () => {
    const variants = [
      "https://example.com/?utm_source=x",
      "https://www.example.com",
      "https://EXAMPLE.com/",
    ];
    expect(variants.map(normalizeUrl)).toEqual([
      "https://example.com",
      "https://example.com",
      "https://example.com",
    ]);
  });

  it("pulls the first link out of shared prose", () => {
    expect(
      normalizeUrl("Check this out: https://example.com/a?utm_source=tw&id=5#section.")
    ).toBe("https://example.com/a?id=5");
  });

  it("keeps apostrophes inside the path", () => {
    expect(normalizeUrl("https://en.example.org/wiki/Schr%C3%B6dinger's_cat")).toBe(
      "https://en.example.org/wiki/Schr%C3%B6dinger's_cat"
    );
    expect(normalizeUrl("https://en.example.org/wiki/Schr%C3%B6dinger")).not.toBe(
      normalizeUrl("https://en.example.org/wiki/Schr%C3%B6dinger's_cat")
    );
    expect(normalizeUrl("She said 'https://example.com/a'.")).toBe("https://example.com/a");
  });

  it("keeps a balanced closing paren and drops an unbalanced one", () => {
    expect(normalizeUrl("(see https://example.com/wiki/Foo_(bar))")).toBe(
      "https://example.com/wiki/Foo_(bar)"
    );
  });

  it("removes tracking params as whole names only", () => {
    expect(normalizeUrl("https://example.com/a?UTM_Medium=x&ref=y&q=1&refresh=2")).toBe(
      "https://example.com/a?q=1&refresh=2"
    );
  });

  it("lower-cases scheme and host but not the path", () => {
    expect(normalizeUrl("HTTPS://Example.COM/Path/")).toBe("https://example.com/Path");
  });

  it("keeps ports and strips repeated trailing slashes", () => {
    expect(normalizeUrl("http://www.example.com:8080/x//")).toBe("http://example.com:8080/x");
  });

  it("does not strip www when it is the registrable name", () => {
    expect(normalizeUrl("https://www.com/")).toBe("https://www.com");
  });

  it("accepts a bare host when it is the whole input", () => {
    expect(normalizeUrl("example.com/page")).toBe("https://example.com/page");
  });

  it("rejects input without an http(s) link", () => {
    expect(() => normalizeUrl("not a url")).toThrow(ValidationError);
    expect(() => normalizeUrl("ftp://example.com/file")).toThrow("Please enter a valid URL");
  });

  it("is stable under repeated application", () => {
    const inputs = [
      "https://www.www.example.com/a/?utm_campaign=z#top",
      "Read https://example.com/a/?x=1&fbclid=abc.",
      "https://example.com/path/?gclid=1/",
      "http://user:pw@Example.org:81/A//?source=feed&b=2",
      "example.org",
    ];
    for (const input of inputs) {
      const once = normalizeUrl(input);
      expect(normalizeUrl(once)).toBe(once);
    }
  });
});

describe("isTrackingParam", () => {
  it("matches utm_ prefixes and the known names", () => {
    expect(["utm_source", "UTM_TERM", "fbclid", "gclid", "ref", "source"].every(isTrackingParam)).toBe(
      true
    );
    expect(isTrackingParam("reference")).toBe(false);
    expect(isTrackingParam("utm")).toBe(false);
  });
});

describe("findUrl", () => {
  it("returns null for blank text", () => {
    expect(findUrl("   ")).toBeNull();
  });

  it("trims trailing punctuation", () => {
    expect(findUrl("Look at https://docs.example.net!")).toBe("https://docs.example.net");
  });
});

describe("extractCapturedUrl", () => {
  it("keeps the link as written apart from surrounding prose", () => {
    expect(extractCapturedUrl("saved: https://www.example.com/A/?utm_source=x")).toBe(
      "https://www.example.com/A/?utm_source=x"
    );
  });

  it("does not cut a link at an apostrophe", () => {
    expect(extractCapturedUrl("read https://en.example.org/wiki/Schr%C3%B6dinger's_cat")).toBe(
      "https://en.example.org/wiki/Schr%C3%B6dinger's_cat"
    );
  });
});

describe("validateUrl", () => {
  it("reports missing and invalid links", () => {
    expect(validateUrl("")).toBe("URL is required");
    expect(validateUrl("nope")).toBe("Please enter a valid URL");
    expect(validateUrl("https://a.io")).toBeNull();
  });
});

describe("extractDomain", () => {
  it("drops www and keeps subdomains", () => {
    expect(extractDomain("https://www.news.example.co.uk/a")).toBe("news.example.co.uk");
  });
});

describe("parseShareDeepLink", () => {
  it("decodes the shared url", () => {
    expect(
      parseShareDeepLink("linkshelf://share?url=https%3A%2F%2Fdocs.example.net%2Fdocs", "linkshelf")
    ).toBe("https://docs.example.net/docs");
  });

  it("accepts the web+ protocol form", () => {
    expect(
      parseShareDeepLink("web+linkshelf://share?url=https%3A%2F%2Fexample.com", "linkshelf")
    ).toBe("https://example.com");
  });

  it("ignores other schemes, routes and missing urls", () => {
    expect(parseShareDeepLink("otherapp://share?url=https%3A%2F%2Fexample.com", "linkshelf")).toBeNull();
    expect(parseShareDeepLink("linkshelf://open?url=https%3A%2F%2Fexample.com", "linkshelf")).toBeNull();
    expect(parseShareDeepLink("linkshelf://share", "linkshelf")).toBeNull();
    expect(parseShareDeepLink("not a uri", "linkshelf")).toBeNull();
  });
});

describe("isPrivateHost", () => {
  it("flags loopback, private ranges and local names", () => {
    const hosts = [
      "localhost",
      "printer.local",
      "api.localhost",
      "127.0.0.1",
      "10.1.2.3",
      "172.20.0.5",
      "192.168.1.1",
      "169.254.169.254",
      "0.0.0.0",
      "[::1]",
      "[fd12::1]",
      "[fe80::1]",
    ];
    expect(hosts.filter((host) => !isPrivateHost(host))).toEqual([]);
  });

  it("leaves public hosts alone", () => {
    expect(isPrivateHost("example.com")).toBe(false);
    expect(isPrivateHost("172.32.0.1")).toBe(false);
    expect(isPrivateHost("8.8.8.8")).toBe(false);
  });
});

describe("isPublicHttpUrl", () => {
  it("reads the host the way the URL parser does", () => {
    expect(isPublicHttpUrl("http://2130706433/")).toBe(false);
    expect(isPublicHttpUrl("http://[::ffff:127.0.0.1]/")).toBe(false);
    expect(isPublicHttpUrl("https://example.com/a")).toBe(true);
    expect(isPublicHttpUrl("ftp://example.com/a")).toBe(false);
  });
});
