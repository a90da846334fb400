import { describe, it, expect } from "vitest";
import {
	validateSchemaDefinition,
	validateSchemaDefinitionSyntax,
	validatePeripheralSchemaStructure,
	validateMcuDescriptorStructure,
} from "../../src/validation/schema-definition.js";

function codes(findings: { code: string }[]): string[] {
	return findings.map((finding) => finding.code);
}

const UART_FIELDS = {
	baudrate: { type: "integer", required: true, min: 1 },
	tx_pin: { type: "pin" },
	rx_pin: { type: "pin" },
};

const VALID_MCU = {
	mcu_patterns: ["TESTMCU1.*"],
	package_info: { package_type: "QFN32", pin_count: 32 },
	package_constraints: {
		gpio_ports: { A: { max: 15 } },
		peripheral_limits: { uart_count: 2 },
	},
	clock_frequency: { min: 1000000, max: 48000000 },
};

describe("validateSchemaDefinitionSyntax", () => {
	it("parses valid YAML without errors", () => {
		const result = validateSchemaDefinitionSyntax("kind: gpio\nfields: {}\n", "yaml");
		expect(result.error).toBeNull();
	});

	it("parses valid JSON without errors", () => {
		const result = validateSchemaDefinitionSyntax('{"kind": "gpio", "fields": {}}', "json");
		expect(result.error).toBeNull();
	});

	it("reports empty content", () => {
		const result = validateSchemaDefinitionSyntax("   \n  \n", "yaml");
		expect(result.error).toEqual([{ message: "Schema document is empty.", severity: "error", code: "empty-document" }]);
	});

	it("reports YAML syntax errors with line and column", () => {
		const result = validateSchemaDefinitionSyntax("kind: gpio\nfields: [\n", "yaml");
		expect(result.error).toHaveLength(1);
		expect(result.error?.[0].code).toBe("syntax-error");
		expect(result.error?.[0].line).toBeTypeOf("number");
		expect(result.error?.[0].column).toBeTypeOf("number");
	});

	it("reports JSON syntax errors", () => {
		const result = validateSchemaDefinitionSyntax('{"kind": }', "json");
		expect(codes(result.error ?? [])).toEqual(["syntax-error"]);
	});
});

describe("validatePeripheralSchemaStructure", () => {
	it("accepts a complete schema", () => {
		const findings = validatePeripheralSchemaStructure({
			kind: "uart",
			description: "Serial port",
			fields: {
				...UART_FIELDS,
				mode: { type: "string", enum: ["async", "sync"], default: "async" },
				clock_pin: { type: "pin", required_when: { field: "mode", equals: "sync" } },
			},
			pins: [
				{ field: "tx_pin", role: "TX", group: "data" },
				{ field: "rx_pin", role: "RX", group: "data" },
				{ field: "clock_pin", role: "CK", when: { field: "mode", equals: "sync" } },
			],
		});
		expect(findings).toEqual([]);
	});

	it("rejects a non-object root", () => {
		expect(codes(validatePeripheralSchemaStructure("just a string"))).toEqual(["invalid-root-type"]);
		expect(codes(validatePeripheralSchemaStructure([]))).toEqual(["invalid-root-type"]);
	});

	it("warns about unknown top-level keys", () => {
		const findings = validatePeripheralSchemaStructure({ kind: "gpio", fields: {}, version: 2 });
		expect(findings).toEqual([
			{ message: 'Unknown top-level key "version".', severity: "warning", code: "unknown-top-level-key", keyPath: "version" },
		]);
	});

	it("rejects an unknown kind", () => {
		const findings = validatePeripheralSchemaStructure({ kind: "can", fields: {} });
		expect(codes(findings)).toEqual(["invalid-kind"]);
		expect(findings[0].message).toBe('"kind" must be one of: board, gpio, uart, i2c, spi, timer.');
	});

	it("requires a fields object", () => {
		expect(codes(validatePeripheralSchemaStructure({ kind: "gpio" }))).toEqual(["invalid-section-type"]);
	});

	describe("field descriptors", () => {
		function fieldFindings(descriptor: unknown) {
			return validatePeripheralSchemaStructure({ kind: "gpio", fields: { pin: descriptor } });
		}

		it("rejects a descriptor that is not an object", () => {
			expect(codes(fieldFindings("pin"))).toEqual(["invalid-field-descriptor"]);
		});

		it("requires a type", () => {
			const findings = fieldFindings({ required: true });
			expect(findings).toEqual([
				{ message: 'Field descriptor is missing "type".', severity: "error", code: "missing-type", keyPath: "fields.pin" },
			]);
		});

		it("rejects an unknown type", () => {
			const findings = fieldFindings({ type: "float" });
			expect(codes(findings)).toEqual(["invalid-type"]);
			expect(findings[0].message).toBe(
				'Invalid type "float". Allowed types: string, integer, number, boolean, pin, pin-list, array, object.',
			);
			expect(findings[0].keyPath).toBe("fields.pin.type");
		});

		it("warns about unknown properties", () => {
			const findings = fieldFindings({ type: "pin", pattern: "^P" });
			expect(findings).toEqual([
				{
					message: 'Unknown field property "pattern".',
					severity: "warning",
					code: "unknown-field-property",
					keyPath: "fields.pin.pattern",
				},
			]);
		});

		it("checks the bounds", () => {
			expect(codes(fieldFindings({ type: "integer", min: "1" }))).toEqual(["invalid-bound"]);

			const findings = fieldFindings({ type: "integer", min: 10, max: 1 });
			expect(findings.map((finding) => finding.message)).toEqual(['"min" (10) is greater than "max" (1).']);
		});

		it("checks enum and default consistency", () => {
			expect(codes(fieldFindings({ type: "string", enum: "a" }))).toEqual(["invalid-enum"]);
			expect(codes(fieldFindings({ type: "string", enum: [] }))).toEqual(["empty-enum"]);
			expect(codes(fieldFindings({ type: "string", enum: ["a", "b"], default: "c" }))).toEqual([
				"default-not-in-enum",
			]);
			expect(codes(fieldFindings({ type: "integer", min: 1, max: 4, default: 5 }))).toEqual([
				"default-out-of-range",
			]);
		});

		it("warns about items and properties on the wrong type", () => {
			expect(codes(fieldFindings({ type: "string", items: { type: "string" } }))).toEqual(["items-without-array-type"]);
			expect(codes(fieldFindings({ type: "array", properties: {} }))).toEqual(["properties-without-object-type"]);
		});

		it("checks nested item and property descriptors", () => {
			const findings = fieldFindings({
				type: "array",
				items: { type: "object", properties: { address: { type: "hex" } } },
			});
			expect(findings.map((finding) => [finding.code, finding.keyPath])).toEqual([
				["invalid-type", "fields.pin.items.properties.address.type"],
			]);
		});

		it("checks conditions against sibling fields", () => {
			const malformed = validatePeripheralSchemaStructure({
				kind: "timer",
				fields: { output_pin: { type: "pin", required_when: { field: "mode" } } },
			});
			expect(codes(malformed)).toEqual(["invalid-condition"]);

			const undeclared = validatePeripheralSchemaStructure({
				kind: "timer",
				fields: { output_pin: { type: "pin", required_when: { field: "mode", equals: "pwm" } } },
			});
			expect(undeclared.map((finding) => [finding.code, finding.keyPath])).toEqual([
				["unknown-condition-field", "fields.output_pin.required_when.field"],
			]);
		});
	});

	describe("pin roles", () => {
		function pinFindings(pins: unknown) {
			return validatePeripheralSchemaStructure({ kind: "uart", fields: UART_FIELDS, pins });
		}

		it("requires an array", () => {
			expect(codes(pinFindings({ tx_pin: "TX" }))).toEqual(["invalid-section-type"]);
		});

		it("rejects entries that are not objects", () => {
			expect(codes(pinFindings(["TX"]))).toEqual(["invalid-pin-role"]);
		});

		it("requires a role name", () => {
			expect(codes(pinFindings([{ field: "tx_pin", role: " " }]))).toEqual(["missing-pin-role"]);
		});

		it("requires a declared pin field", () => {
			expect(codes(pinFindings([{ field: "ck_pin", role: "CK" }]))).toEqual(["unknown-pin-field"]);
			expect(codes(pinFindings([{ field: "baudrate", role: "CK" }]))).toEqual(["invalid-pin-field-type"]);
		});

		it("checks role fields and conditions", () => {
			expect(codes(pinFindings([{ field: "tx_pin", role: "TX", role_field: "direction" }]))).toEqual([
				"unknown-role-field",
			]);
			expect(codes(pinFindings([{ field: "tx_pin", role: "TX", when: { field: "mode", equals: "x" } }]))).toEqual([
				"unknown-condition-field",
			]);
		});

		it("warns about unknown properties", () => {
			const findings = pinFindings([{ field: "tx_pin", role: "TX", alternate: 7 }]);
			expect(findings.map((finding) => [finding.severity, finding.code, finding.keyPath])).toEqual([
				["warning", "unknown-pin-role-property", "pins[0].alternate"],
			]);
		});
	});

	describe("address spaces", () => {
		const fields = {
			devices: { type: "array", items: { type: "object", properties: { address: { type: "integer" } } } },
			speed: { type: "integer" },
		};

		it("accepts a list of devices", () => {
			const findings = validatePeripheralSchemaStructure({
				kind: "i2c",
				fields,
				addresses: { list: "devices", field: "address", name_field: "name" },
			});
			expect(findings).toEqual([]);
		});

		it("requires the list to name an array field", () => {
			const findings = validatePeripheralSchemaStructure({
				kind: "i2c",
				fields,
				addresses: { list: "speed", field: "address" },
			});
			expect(findings.map((finding) => [finding.code, finding.keyPath])).toEqual([
				["invalid-address-space", "addresses.list"],
			]);
		});

		it("requires the address field name", () => {
			const findings = validatePeripheralSchemaStructure({ kind: "i2c", fields, addresses: { list: "devices" } });
			expect(findings.map((finding) => [finding.code, finding.keyPath])).toEqual([
				["invalid-address-space", "addresses.field"],
			]);
		});

		it("warns about unknown properties", () => {
			const findings = validatePeripheralSchemaStructure({
				kind: "i2c",
				fields,
				addresses: { list: "devices", field: "address", width: 7 },
			});
			expect(codes(findings)).toEqual(["unknown-address-space-property"]);
		});
	});
});

describe("validateMcuDescriptorStructure", () => {
	it("accepts a complete descriptor", () => {
		expect(validateMcuDescriptorStructure(VALID_MCU)).toEqual([]);
	});

	it("requires non-empty patterns", () => {
		expect(codes(validateMcuDescriptorStructure({ ...VALID_MCU, mcu_patterns: [] }))).toEqual(["invalid-mcu-patterns"]);
		expect(codes(validateMcuDescriptorStructure({ ...VALID_MCU, mcu_patterns: ["STM32*", ""] }))).toEqual([
			"invalid-mcu-patterns",
		]);
	});

	it("requires package constraints", () => {
		const { package_constraints: _omitted, ...rest } = VALID_MCU;
		expect(codes(validateMcuDescriptorStructure(rest))).toEqual(["invalid-package-constraints"]);
	});

	it("checks GPIO ports", () => {
		const findings = validateMcuDescriptorStructure({
			...VALID_MCU,
			package_constraints: { gpio_ports: { a: { max: 15 }, B: { max: -1 } } },
		});
		expect(findings.map((finding) => [finding.code, finding.keyPath])).toEqual([
			["invalid-gpio-port", "package_constraints.gpio_ports.a"],
			["invalid-gpio-port", "package_constraints.gpio_ports.B"],
		]);
	});

	it("checks peripheral limits", () => {
		const findings = validateMcuDescriptorStructure({
			...VALID_MCU,
			package_constraints: { gpio_ports: { A: { max: 15 } }, peripheral_limits: { can_count: 2, uart_count: 1.5 } },
		});
		expect(findings.map((finding) => [finding.severity, finding.code])).toEqual([
			["warning", "unknown-peripheral-limit"],
			["error", "invalid-peripheral-limit"],
		]);
	});

	it("checks package info", () => {
		expect(
			codes(validateMcuDescriptorStructure({ ...VALID_MCU, package_info: { package_type: "QFN32", pin_count: "32" } })),
		).toEqual(["invalid-package-info"]);
	});

	it("checks electrical ranges", () => {
		expect(codes(validateMcuDescriptorStructure({ ...VALID_MCU, voltage: { min: "1.8" } }))).toEqual(["invalid-range"]);

		const findings = validateMcuDescriptorStructure({ ...VALID_MCU, clock_frequency: { min: 48000000, max: 1000000 } });
		expect(findings).toEqual([
			{
				message: '"min" (48000000) is greater than "max" (1000000).',
				severity: "error",
				code: "min-greater-than-max",
				keyPath: "clock_frequency",
			},
		]);
	});

	it("warns about unknown top-level keys", () => {
		expect(codes(validateMcuDescriptorStructure({ ...VALID_MCU, vendor: "test" }))).toEqual(["unknown-top-level-key"]);
	});
});

describe("validateSchemaDefinition", () => {
	it("returns syntax errors without checking structure", () => {
		expect(codes(validateSchemaDefinition("{", "json", "peripheral"))).toEqual(["syntax-error"]);
	});

	it("checks the structure of the chosen document type", () => {
		expect(codes(validateSchemaDefinition("kind: gpio\nfields: {}\n", "yaml", "peripheral"))).toEqual([]);
		expect(codes(validateSchemaDefinition('{"mcu_patterns": []}', "json", "mcu"))).toEqual([
			"invalid-mcu-patterns",
			"invalid-package-constraints",
		]);
	});
});
