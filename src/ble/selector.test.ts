import { describe, expect, it } from "vitest";
import { buildTestServices } from "../__tests__/fixtures";
import { NoCapableCharacteristicError } from "../errors/errors";
import {
	describeServices,
	findCharacteristic,
	select,
	selectFirst,
	selectOne,
	WRITABLE,
} from "./selector";

const services = buildTestServices([
	{
		id: "180a",
		characteristics: [
			["A", ["read"]],
			["B", ["write", "notify"]],
		],
	},
	{
		id: "fff0",
		characteristics: [
			["C", ["write"]],
			["D", ["writeWithoutResponse"]],
		],
	},
]);

function ids(list: readonly { id: string }[]): string[] {
	return list.map((c) => c.id);
}

describe("select", () => {
	it("returns write-capable characteristics in service then characteristic order", () => {
		expect(ids(select(services, "write"))).toEqual(["B", "C"]);
	});

	it("returns an empty list when nothing matches", () => {
		expect(select(services, "indicate")).toEqual([]);
	});

	it("keeps the back-reference to the owning service", () => {
		const [c] = select(services, "writeWithoutResponse");
		expect(c?.service.id).toBe("fff0");
	});
});

describe("selectFirst", () => {
	it("takes the first characteristic offering any of the capabilities", () => {
		const commandFirst = buildTestServices([
			{
				id: "fff0",
				characteristics: [
					["aaaa", ["writeWithoutResponse"]],
					["bbbb", ["write"]],
				],
			},
		]);
		expect(selectFirst(commandFirst, WRITABLE).id).toBe("aaaa");
		expect(selectFirst(services, WRITABLE).id).toBe("B");
	});

	it("throws NoCapableCharacteristicError when none qualifies", () => {
		expect(() => selectFirst(services, ["indicate"])).toThrow(
			"No characteristic supports indicate",
		);
	});
});

describe("selectOne", () => {
	it("picks the first candidate of a single capability", () => {
		expect(selectOne(services, "notify").id).toBe("B");
	});

	it("tries capabilities in the caller's order", () => {
		expect(selectOne(services, ["writeWithoutResponse", "write"]).id).toBe("D");
		expect(selectOne(services, WRITABLE).id).toBe("B");
	});

	it("falls back to the next capability when the first has no candidate", () => {
		const onlyCommands = buildTestServices([
			{ id: "fff0", characteristics: [["D", ["writeWithoutResponse"]]] },
		]);
		expect(selectOne(onlyCommands, WRITABLE).id).toBe("D");
	});

	it("throws NoCapableCharacteristicError instead of broadening", () => {
		expect(() => selectOne(services, "indicate")).toThrow(
			NoCapableCharacteristicError,
		);
		expect(() => selectOne(services, ["indicate"])).toThrow(
			"No characteristic supports indicate",
		);
	});
});

describe("findCharacteristic", () => {
	const byUuid = buildTestServices([
		{
			id: "0000180a-0000-1000-8000-00805f9b34fb",
			characteristics: [["00002a29-0000-1000-8000-00805f9b34fb", ["read"]]],
		},
		{
			id: "0000fff0-0000-1000-8000-00805f9b34fb",
			characteristics: [["00002a29-0000-1000-8000-00805f9b34fb", ["write"]]],
		},
	]);

	it("finds by short UUID", () => {
		expect(findCharacteristic(byUuid, "2A29")?.service.id).toBe(
			"0000180a-0000-1000-8000-00805f9b34fb",
		);
	});

	it("narrows by service when the UUID repeats", () => {
		const found = findCharacteristic(byUuid, "2a29", "fff0");
		expect(found?.capabilities.has("write")).toBe(true);
	});

	it("returns undefined when missing", () => {
		expect(findCharacteristic(byUuid, "2a00")).toBeUndefined();
	});
});

describe("describeServices", () => {
	it("lists capabilities in a fixed order", () => {
		const mixed = buildTestServices([
			{ id: "fff0", characteristics: [["X", ["notify", "write", "read"]]] },
		]);
		expect(describeServices(mixed)).toEqual([
			{
				serviceId: "fff0",
				characteristics: [{ id: "X", capabilities: ["read", "write", "notify"] }],
			},
		]);
	});
});
