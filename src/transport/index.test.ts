import { custom } from "viem";
import { describe, it, expect, vi, beforeEach } from "vitest";
import { RpcCallTransport, TransportError, TransportErrorType } from ".";

const target = "0xcA11bde05977b3631167028862bE2a173976CA11";
const owner = "0x1111111111111111111111111111111111111111";

describe("Test RpcCallTransport", () => {
    const provider = {
        request: vi.fn(),
    };

    beforeEach(() => {
        vi.clearAllMocks();
    });

    it("should send eth_call with latest block by default", async () => {
        provider.request.mockResolvedValueOnce("0x1234");
        const transport = new RpcCallTransport(custom(provider));

        const result = await transport.simulateCall({
            to: target,
            input: "0xabcd",
            inputKind: "input",
        });

        expect(result).toBe("0x1234");
        expect(provider.request).toHaveBeenCalledTimes(1);
        expect(provider.request.mock.calls[0][0]).toEqual({
            method: "eth_call",
            params: [{ to: target, input: "0xabcd" }, "latest"],
        });
    });

    it("should send block, value and state overrides", async () => {
        provider.request.mockResolvedValueOnce("0x");
        const transport = new RpcCallTransport(custom(provider));

        await transport.simulateCall({
            to: target,
            input: "0xabcd",
            inputKind: "data",
            value: 16n,
            block: 100n,
            stateOverride: { [owner]: { balance: 1n } },
        });

        expect(provider.request.mock.calls[0][0]).toEqual({
            method: "eth_call",
            params: [
                { to: target, data: "0xabcd", value: "0x10" },
                "0x64",
                { [owner]: { balance: "0x1" } },
            ],
        });
    });

    it("should reject non hex replies", async () => {
        provider.request.mockResolvedValueOnce({ unexpected: true });
        const transport = new RpcCallTransport(custom(provider));

        const error = await transport
            .simulateCall({ to: target, input: "0x", inputKind: "input" })
            .catch((e: unknown) => e);

        expect(error).toBeInstanceOf(TransportError);
        expect(error).toMatchObject({
            type: TransportErrorType.InvalidResponse,
            message: "expected hex encoded return data, got: object",
        });
    });

    it("should not retry failed requests", async () => {
        provider.request.mockRejectedValue(new Error("execution reverted"));
        const transport = new RpcCallTransport(custom(provider));

        await expect(
            transport.simulateCall({ to: target, input: "0x", inputKind: "input" }),
        ).rejects.toThrow();
        expect(provider.request).toHaveBeenCalledTimes(1);
    });
});
