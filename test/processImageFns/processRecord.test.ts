import { ProcessingError } from "../../helpers/errors";
import { SplitterConfig } from "../../types/splitterConfig";
import { decodeImage } from "../../processImageFns/decodeImage";
import { processRecord } from "../../processImageFns/processRecord";

import { InMemoryStorageGateway } from "../fixtures/inMemoryStorageGateway";
import { destinationBucket, sourceBucket } from "../fixtures/events";
import { channelValues, createPng, rgbPixels } from "../fixtures/images";

console.log = jest.fn();
console.error = jest.fn();

const config: SplitterConfig = {
  destinationBucket,
  outputFormat: "png",
};

describe("processRecord", () => {
  let storage: InMemoryStorageGateway;

  beforeEach(async () => {
    jest.clearAllMocks();

    storage = new InMemoryStorageGateway();
    storage.put(sourceBucket, "cat.png", await createPng(rgbPixels, 3));
  });

  test("it stores a red, green and blue image under the channel prefix", async () => {
    const outcome = await processRecord({
      record: { bucketName: sourceBucket, encodedKey: "cat.png" },
      config,
      storage,
    });

    expect(outcome).toEqual({
      objectKey: "cat.png",
      destinationKeys: ["red/cat.png", "green/cat.png", "blue/cat.png"],
    });
    expect(storage.storeCalls).toEqual([
      "destination-bucket/red/cat.png",
      "destination-bucket/green/cat.png",
      "destination-bucket/blue/cat.png",
    ]);

    const green = storage.get(destinationBucket, "green/cat.png");

    expect(green?.contentType).toBe("image/png");

    const decoded = await decodeImage(green?.bytes ?? new Uint8Array());

    expect(channelValues(decoded.data, 0)).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
    expect(channelValues(decoded.data, 1)).toEqual([
      0, 255, 0, 20, 100, 2, 128, 0,
    ]);
    expect(channelValues(decoded.data, 2)).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
  });

  test("it decodes the key before reading and writing", async () => {
    storage.put(
      sourceBucket,
      "my photos/cat 1.png",
      await createPng(rgbPixels, 3)
    );

    const outcome = await processRecord({
      record: {
        bucketName: sourceBucket,
        encodedKey: "my+photos/cat%201.png",
      },
      config,
      storage,
    });

    expect(outcome).toEqual({
      objectKey: "my photos/cat 1.png",
      destinationKeys: [
        "red/my photos/cat 1.png",
        "green/my photos/cat 1.png",
        "blue/my photos/cat 1.png",
      ],
    });
  });

  test("it logs the size of the loaded image", async () => {
    await processRecord({
      record: { bucketName: sourceBucket, encodedKey: "cat.png" },
      config,
      storage,
    });

    expect(console.log).toHaveBeenCalledWith(
      "Successfully loaded image cat.png: 4x2 pixels"
    );
  });

  test("processing the same record twice leaves the same objects", async () => {
    const record = { bucketName: sourceBucket, encodedKey: "cat.png" };

    await processRecord({ record, config, storage });

    const firstRed = storage.get(destinationBucket, "red/cat.png")?.bytes;

    await processRecord({ record, config, storage });

    expect(storage.objects.size).toBe(4);
    expect(storage.get(destinationBucket, "red/cat.png")?.bytes).toEqual(
      firstRed
    );
  });

  test("a missing source object becomes a ProcessingError carrying the key", async () => {
    const failure = processRecord({
      record: { bucketName: sourceBucket, encodedKey: "missing.png" },
      config,
      storage,
    });

    await expect(failure).rejects.toBeInstanceOf(ProcessingError);
    await expect(failure).rejects.toMatchObject({
      objectKey: "missing.png",
      message:
        "Error processing missing.png: Object missing.png was not found in bucket source-bucket",
    });
    expect(storage.storeCalls).toEqual([]);
  });

  test("an unreadable source image becomes a ProcessingError", async () => {
    storage.put(sourceBucket, "notes.txt", Buffer.from("just some text"));

    await expect(
      processRecord({
        record: { bucketName: sourceBucket, encodedKey: "notes.txt" },
        config,
        storage,
      })
    ).rejects.toMatchObject({ name: "ProcessingError", objectKey: "notes.txt" });

    expect(console.error).toHaveBeenCalledTimes(1);
  });

  test("outputs stored before a failed upload are kept", async () => {
    const store = storage.store.bind(storage);

    jest
      .spyOn(storage, "store")
      .mockImplementation(async (bucket, key, bytes, contentType) => {
        if (key.startsWith("blue/")) {
          throw new Error("connection reset");
        }

        return store(bucket, key, bytes, contentType);
      });

    await expect(
      processRecord({
        record: { bucketName: sourceBucket, encodedKey: "cat.png" },
        config,
        storage,
      })
    ).rejects.toThrow("Error processing cat.png: connection reset");

    expect(storage.get(destinationBucket, "red/cat.png")).toBeDefined();
    expect(storage.get(destinationBucket, "green/cat.png")).toBeDefined();
    expect(storage.get(destinationBucket, "blue/cat.png")).toBeUndefined();
  });
});
