import {describe, test, expect} from "vitest";
import {ZodError} from "zod";
import {
	DEFAULT_BASE_URL,
	RouterOptionsError,
	parseRouterOptions,
} from "../src/index.js";

describe("parseRouterOptions", () => {
	test("applies defaults", () => {
		expect(parseRouterOptions()).toEqual({
			aliases: {},
			baseURL: DEFAULT_BASE_URL,
		});
		expect(DEFAULT_BASE_URL).toBe("http://localhost");
	});

	test("accepts options loaded from JSON", () => {
		const options = parseRouterOptions(
			JSON.parse('{"baseURL": "myapp://host", "aliases": {"id": "[0-9]+"}}'),
		);

		expect(options).toEqual({
			baseURL: "myapp://host",
			aliases: {id: "[0-9]+"},
		});
	});

	test("rejects unknown keys", () => {
		expect(() => parseRouterOptions({aliasses: {}})).toThrow(RouterOptionsError);
	});

	test("rejects non-string alias patterns", () => {
		expect(() => parseRouterOptions({aliases: {id: 42}})).toThrow(
			RouterOptionsError,
		);
	});

	test("rejects a relative base URL", () => {
		let error: unknown;
		try {
			parseRouterOptions({baseURL: "/app"});
		} catch (err) {
			error = err;
		}

		expect(error).toBeInstanceOf(RouterOptionsError);
		if (!(error instanceof RouterOptionsError)) return;
		expect(error.name).toBe("RouterOptionsError");
		expect(error.message.startsWith("Invalid router options: baseURL: ")).toBe(true);
		expect(error.cause).toBeInstanceOf(ZodError);
	});

	test("rejects a non-object", () => {
		expect(() => parseRouterOptions("http://localhost")).toThrow(
			RouterOptionsError,
		);
	});
});
