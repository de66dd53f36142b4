import { promises as fsPromises } from "fs";
import * as os from "os";
import * as path from "path";
import {
    FilePositionStore,
    fromPositionRecord,
    MemoryPositionStore,
    POSITION_REDIS_KEY,
    PositionHashClient,
    RedisPositionStore,
    toPositionRecord,
} from "../positionStore";

const position = { bookId: "book-1", segmentIndex: 2, offsetMillis: 93_500, playbackSpeed: 1.25 };

describe("position records", () => {
    it("maps to the persisted field names", () => {
        expect(toPositionRecord(position)).toEqual({
            last_book_id: "book-1",
            last_segment_index: 2,
            last_position_ms: 93_500,
            last_speed: 1.25,
        });
    });

    it("reads string values and normalizes ranges", () => {
        expect(
            fromPositionRecord({
                last_book_id: "book-1",
                last_segment_index: "-1",
                last_position_ms: "1200.7",
                last_speed: "9",
            })
        ).toEqual({ bookId: "book-1", segmentIndex: 0, offsetMillis: 1200, playbackSpeed: 2 });
        expect(fromPositionRecord({ last_book_id: "", last_segment_index: 0, last_position_ms: 0, last_speed: 1 })).toBeNull();
        expect(fromPositionRecord({ bookId: "book-1" })).toBeNull();
    });
});

describe("MemoryPositionStore", () => {
    it("returns copies of the saved position", async () => {
        const store = new MemoryPositionStore();
        await store.save(position);

        const loaded = await store.load();
        expect(loaded).toEqual(position);
        expect(loaded).not.toBe(position);
        expect(store.saveCount).toBe(1);

        await store.clear();
        await expect(store.load()).resolves.toBeNull();
    });
});

describe("FilePositionStore", () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fsPromises.mkdtemp(path.join(os.tmpdir(), "position-"));
    });

    afterEach(async () => {
        await fsPromises.rm(dir, { recursive: true, force: true });
    });

    it("returns null before anything is saved", async () => {
        await expect(new FilePositionStore(path.join(dir, "position.json")).load()).resolves.toBeNull();
    });

    it("writes a JSON record and reads it back", async () => {
        const filePath = path.join(dir, "nested", "position.json");
        const store = new FilePositionStore(filePath);

        await store.save(position);

        await expect(fsPromises.readFile(filePath, "utf8")).resolves.toBe(
            '{\n  "last_book_id": "book-1",\n  "last_segment_index": 2,\n  "last_position_ms": 93500,\n  "last_speed": 1.25\n}\n'
        );
        await expect(fsPromises.readdir(path.dirname(filePath))).resolves.toEqual(["position.json"]);
        await expect(store.load()).resolves.toEqual(position);

        await store.clear();
        await expect(store.load()).resolves.toBeNull();
    });

    it("treats a corrupt file as no saved position", async () => {
        const filePath = path.join(dir, "position.json");
        await fsPromises.writeFile(filePath, "{ not json");

        await expect(new FilePositionStore(filePath).load()).resolves.toBeNull();
    });
});

describe("RedisPositionStore", () => {
    function createClient() {
        const hashes = new Map<string, Record<string, string>>();
        const client: PositionHashClient = {
            hgetall: jest.fn(async (key: string) => ({ ...(hashes.get(key) ?? {}) })),
            hset: jest.fn(async (key: string, values: Record<string, string>) => {
                hashes.set(key, { ...(hashes.get(key) ?? {}), ...values });
                return Object.keys(values).length;
            }),
            del: jest.fn(async (key: string) => (hashes.delete(key) ? 1 : 0)),
        };
        return { client, hashes };
    }

    it("stores the record as string fields of one hash", async () => {
        const { client, hashes } = createClient();
        const store = new RedisPositionStore(client);

        await store.save(position);

        expect(hashes.get(POSITION_REDIS_KEY)).toEqual({
            last_book_id: "book-1",
            last_segment_index: "2",
            last_position_ms: "93500",
            last_speed: "1.25",
        });
        await expect(store.load()).resolves.toEqual(position);
    });

    it("returns null for a missing or malformed hash", async () => {
        const { client, hashes } = createClient();
        const store = new RedisPositionStore(client, "custom:key");

        await expect(store.load()).resolves.toBeNull();

        hashes.set("custom:key", { last_segment_index: "1" });
        await expect(store.load()).resolves.toBeNull();
    });

    it("clears the hash", async () => {
        const { client, hashes } = createClient();
        const store = new RedisPositionStore(client);
        await store.save(position);

        await store.clear();

        expect(hashes.has(POSITION_REDIS_KEY)).toBe(false);
        expect(client.del).toHaveBeenCalledWith(POSITION_REDIS_KEY);
    });
});
