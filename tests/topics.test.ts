import { describe, it, expect } from "vitest";
import { clientIdFromStatusTopic } from "../src/clientIdFromStatusTopic";
import { replyTopic } from "../src/replyTopic";
import { telemetryTopic } from "../src/telemetryTopic";
import { topicMatches } from "../src/topicMatches";

describe("topics", () => {
    it("extracts the client id of a status topic", () => {
        expect(clientIdFromStatusTopic("device/fe001/Status")).toBe("fe001");
        expect(clientIdFromStatusTopic("device//Status")).toBeNull();
        expect(clientIdFromStatusTopic("device/fe001/status")).toBeNull();
        expect(clientIdFromStatusTopic("device/fe001/Status/extra")).toBeNull();
    });

    it("builds reply and telemetry topics", () => {
        expect(replyTopic("fe001")).toBe("device/fe001/DeviceInstance");
        expect(telemetryTopic("b827eb000001", "temperature", 5, "Temperature")).toBe(
            "W/b827eb000001/temperature/5/Temperature"
        );
    });

    describe("topicMatches", () => {
        it("matches single-level wildcards", () => {
            expect(topicMatches("device/+/Status", "device/fe001/Status")).toBe(true);
            expect(topicMatches("device/+/Status", "device/fe001/DeviceInstance")).toBe(false);
            expect(topicMatches("device/+/Status", "device/a/b/Status")).toBe(false);
        });

        it("matches multi-level wildcards", () => {
            expect(topicMatches("device/#", "device/fe001/Status")).toBe(true);
            expect(topicMatches("W/#", "device/fe001/Status")).toBe(false);
        });

        it("requires the same depth without wildcards", () => {
            expect(topicMatches("device/fe001", "device/fe001/Status")).toBe(false);
            expect(topicMatches("device/fe001/Status", "device/fe001/Status")).toBe(true);
        });
    });
});
