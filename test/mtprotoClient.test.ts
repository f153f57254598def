import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Api, errors } from "telegram";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
    createTelegramConnector,
    isSessionAuthorized,
    loadSessionString,
    sessionFilePath,
} from "../src/mtprotoClient.js";

describe("session storage", () => {
    let dataDir: string;

    beforeEach(() => {
        dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "gift-buyer-"));
    });

    afterEach(() => {
        fs.rmSync(dataDir, { recursive: true, force: true });
    });

    it("adds the .session extension once", () => {
        expect(sessionFilePath("/data", "tg_gifts")).toBe(path.join("/data", "tg_gifts.session"));
        expect(sessionFilePath("/data", "tg_gifts.session")).toBe(path.join("/data", "tg_gifts.session"));
    });

    it("keeps session files inside the data directory", () => {
        expect(sessionFilePath("/data", "../../etc/passwd")).toBe(path.join("/data", "passwd.session"));
    });

    it("reads a stored session string", () => {
        fs.writeFileSync(path.join(dataDir, "main.session"), "test-session-string\n", "utf8");
        expect(loadSessionString("main", { dataDir })).toBe("test-session-string");
    });

    it("prefers SESSION_STRING over the file", () => {
        fs.writeFileSync(path.join(dataDir, "main.session"), "from-file", "utf8");
        expect(loadSessionString("main", { dataDir, sessionString: "from-env" })).toBe("from-env");
    });

    it("returns an empty string when nothing is stored", () => {
        expect(loadSessionString("missing", { dataDir })).toBe("");
    });

    it("asks for a login instead of connecting without a stored session", async () => {
        const connector = createTelegramConnector({ apiId: 1, apiHash: "test-hash" }, { dataDir });
        await expect(connector.tryOpen("missing")).resolves.toEqual({ status: "authRequired" });
    });
});

describe("isSessionAuthorized", () => {
    const request = new Api.updates.GetState();

    function clientThat(result: Promise<unknown>) {
        return { invoke: vi.fn<(req: Api.updates.GetState) => Promise<unknown>>().mockReturnValue(result) };
    }

    it("accepts a session the server answers", async () => {
        const client = clientThat(Promise.resolve({}));
        await expect(isSessionAuthorized(client)).resolves.toBe(true);
        expect(client.invoke).toHaveBeenCalledTimes(1);
    });

    it("reports a session the server rejects", async () => {
        const client = clientThat(Promise.reject(new errors.RPCError("AUTH_KEY_UNREGISTERED", request, 401)));
        await expect(isSessionAuthorized(client)).resolves.toBe(false);
    });

    it("rethrows a flood wait instead of asking for a login", async () => {
        const flood = new errors.RPCError("FLOOD_WAIT_5", request, 420);
        await expect(isSessionAuthorized(clientThat(Promise.reject(flood)))).rejects.toBe(flood);
    });

    it("rethrows network failures", async () => {
        await expect(isSessionAuthorized(clientThat(Promise.reject(new Error("TIMEOUT"))))).rejects.toThrow("TIMEOUT");
    });
});
