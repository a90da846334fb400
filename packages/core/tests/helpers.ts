import type { BoardConfig, McuDescriptor, PeripheralSchema, RawBoardConfig, SchemaRegistry } from "../src/index.js";
import { createSchemaRegistry, normaliseBoardConfig, normaliseMcuDescriptor, normalisePeripheralSchema } from "../src/index.js";

export const TEST_MCU: McuDescriptor = normaliseMcuDescriptor("testmcu", {
	mcu_patterns: ["TESTMCU1.*"],
	package_info: { package_type: "QFN32", pin_count: 32 },
	package_constraints: {
		gpio_ports: { A: { max: 15 }, B: { max: 7 } },
		peripheral_limits: { uart_count: 2, i2c_count: 1, spi_count: 1, timer_count: 2 },
	},
	clock_frequency: { min: 1000000, max: 48000000 },
	voltage: { min: 1.8, max: 3.6 },
});

const enabled = { type: "boolean", default: true };
const pwm = { field: "mode", equals: "pwm" };

export const TEST_SCHEMAS: Record<string, PeripheralSchema> = {
	board: normalisePeripheralSchema({
		kind: "board",
		fields: {
			name: { type: "string", required: true },
			mcu: { type: "string", required: true },
			clock_frequency: { type: "integer", required: true, min: 1 },
			voltage: { type: "number", default: 3.3 },
		},
	}),
	gpio: normalisePeripheralSchema({
		kind: "gpio",
		fields: {
			pin: { type: "pin", required: true },
			direction: { type: "string", required: true, enum: ["input", "output"] },
			pull: { type: "string", default: "none", enum: ["none", "up", "down"] },
			enabled,
		},
		pins: [{ field: "pin", role: "GPIO", role_field: "direction" }],
	}),
	uart: normalisePeripheralSchema({
		kind: "uart",
		fields: {
			enabled,
			baudrate: { type: "integer", required: true, min: 1 },
			data_bits: { type: "integer", default: 8, enum: [7, 8, 9] },
			tx_pin: { type: "pin" },
			rx_pin: { type: "pin" },
		},
		pins: [
			{ field: "tx_pin", role: "TX", group: "data" },
			{ field: "rx_pin", role: "RX", group: "data" },
		],
	}),
	i2c: normalisePeripheralSchema({
		kind: "i2c",
		fields: {
			enabled,
			speed: { type: "integer", required: true },
			scl_pin: { type: "pin", required: true },
			sda_pin: { type: "pin", required: true },
			devices: {
				type: "array",
				default: [],
				items: {
					type: "object",
					properties: {
						name: { type: "string", required: true },
						address: { type: "integer", required: true, min: 8, max: 119 },
					},
				},
			},
		},
		pins: [
			{ field: "scl_pin", role: "SCL", required: true },
			{ field: "sda_pin", role: "SDA", required: true },
		],
		addresses: { list: "devices", field: "address", name_field: "name" },
	}),
	spi: normalisePeripheralSchema({
		kind: "spi",
		fields: {
			enabled,
			mode: { type: "integer", required: true, enum: [0, 1, 2, 3] },
			sck_pin: { type: "pin" },
			miso_pin: { type: "pin" },
			mosi_pin: { type: "pin" },
			cs_pins: { type: "pin-list", default: [] },
		},
		pins: [
			{ field: "sck_pin", role: "SCK" },
			{ field: "miso_pin", role: "MISO" },
			{ field: "mosi_pin", role: "MOSI" },
			{ field: "cs_pins", role: "CS", required: true },
		],
	}),
	timer: normalisePeripheralSchema({
		kind: "timer",
		fields: {
			enabled,
			mode: { type: "string", default: "periodic", enum: ["periodic", "pwm", "input-capture"] },
			period: { type: "integer", required: true, min: 1, max: 65536 },
			duty_cycle: { type: "integer", min: 0, max: 100, required_when: pwm },
			output_pin: { type: "pin", required_when: pwm },
		},
		pins: [{ field: "output_pin", role: "PWM", required: true, when: pwm }],
	}),
};

export function testRegistry(mcus: McuDescriptor[] = [TEST_MCU]): SchemaRegistry {
	return createSchemaRegistry(mcus, Object.values(TEST_SCHEMAS));
}

/**
 * Build a board configuration on the test MCU; `board` fields override the defaults.
 */
export function testBoard(sections: Partial<RawBoardConfig> = {}): BoardConfig {
	const { board, ...peripherals } = sections;
	return normaliseBoardConfig({
		board: { name: "test-board", mcu: "TESTMCU1A", clock_frequency: 16000000, ...board },
		...peripherals,
	});
}
