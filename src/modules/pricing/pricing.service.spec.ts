import { Types } from "mongoose";

import { cleaningService, quantityBlock } from "../../../test/factories";
import {
  InMemoryCleaningServiceStore,
  InMemoryPricingBlockStore,
} from "../../../test/fakes";

import { PricingService } from "./pricing.service";

describe("PricingService", () => {
  let services: InMemoryCleaningServiceStore;
  let blocks: InMemoryPricingBlockStore;
  let pricing: PricingService;

  const published = cleaningService({ name: "Window cleaning" });
  const draft = cleaningService({ name: "Rug cleaning", isPublished: false });

  beforeEach(() => {
    services = new InMemoryCleaningServiceStore();
    services.collection.seed(published, draft);
    blocks = new InMemoryPricingBlockStore();
    pricing = new PricingService(blocks, services);
  });

  describe("createBlock", () => {
    it("stores the payload that matches the kind", async () => {
      const created = await pricing.createBlock(published._id.toString(), {
        name: "Windows",
        kind: "quantity",
        semanticKey: "window",
        quantityOption: {
          name: "Windows",
          unitPrice: 25,
          minQuantity: 1,
          maxQuantity: 20,
          unitName: "window",
        },
      });

      expect(created).toMatchObject({
        serviceId: published._id.toString(),
        kind: "quantity",
        semanticKey: "window",
        order: 0,
        isRequired: true,
        isActive: true,
        typeOption: undefined,
        toggleOption: undefined,
      });
      expect(blocks.collection.docs).toHaveLength(1);
    });

    it("rejects a payload for another kind", async () => {
      await expect(
        pricing.createBlock(published._id.toString(), {
          name: "Pet hair",
          kind: "quantity",
          toggleOption: {
            name: "Pet hair",
            shortDescription: "Extra brushing",
            percentageIncrease: 10,
          },
        })
      ).rejects.toMatchObject({
        statusCode: 400,
        errorCode: "PRICING_OPTION_MISMATCH",
      });
    });

    it("fails for an unknown service", async () => {
      await expect(
        pricing.createBlock(new Types.ObjectId().toString(), {
          name: "Windows",
          kind: "quantity",
        })
      ).rejects.toMatchObject({
        statusCode: 404,
        errorCode: "SERVICE_NOT_FOUND",
      });
    });
  });

  it("deactivates a block without deleting it", async () => {
    const block = quantityBlock({ unitPrice: 10 }, { serviceId: published._id });
    blocks.collection.seed(block);

    const result = await pricing.deactivateBlock(block._id.toString());

    expect(result.isActive).toBe(false);
    expect(await pricing.listBlocks(published._id.toString())).toEqual([]);
    expect(
      await pricing.listBlocks(published._id.toString(), true)
    ).toHaveLength(1);
  });

  it("reorders blocks of the service", async () => {
    const first = quantityBlock(
      { name: "First", unitPrice: 1 },
      { serviceId: published._id, order: 0 }
    );
    const second = quantityBlock(
      { name: "Second", unitPrice: 1 },
      { serviceId: published._id, order: 1 }
    );
    blocks.collection.seed(first, second);

    const result = await pricing.reorderBlocks(published._id.toString(), [
      { blockId: first._id.toString(), order: 2 },
    ]);

    expect(result.map((block) => block.name)).toEqual(["Second", "First"]);
  });

  it("refuses to reorder a block of another service", async () => {
    const foreign = quantityBlock({ unitPrice: 1 }, { serviceId: draft._id });
    blocks.collection.seed(foreign);

    await expect(
      pricing.reorderBlocks(published._id.toString(), [
        { blockId: foreign._id.toString(), order: 0 },
      ])
    ).rejects.toMatchObject({ errorCode: "PRICING_BLOCK_NOT_FOUND" });
  });

  describe("previewPrice", () => {
    const windows = quantityBlock(
      { name: "Windows", unitPrice: 12.345, minQuantity: 1, maxQuantity: 10 },
      { serviceId: published._id, isRequired: true }
    );

    beforeEach(() => {
      blocks.collection.seed(windows);
    });

    it("returns the rounded total", async () => {
      const preview = await pricing.previewPrice(published._id.toString(), [
        { blockId: windows._id.toString(), quantity: 2 },
      ]);

      expect(preview.serviceName).toBe("Window cleaning");
      expect(preview.totalPrice).toBe(24.69);
      expect(preview.estimatedTimeMinutes).toBe(30);
    });

    it("rejects quantities outside the bounds", async () => {
      await expect(
        pricing.previewPrice(published._id.toString(), [
          { blockId: windows._id.toString(), quantity: 11 },
        ])
      ).rejects.toMatchObject({
        statusCode: 400,
        errorCode: "PRICING_QUANTITY_OUT_OF_RANGE",
        message: "Windows: quantity must be between 1 and 10",
      });
    });

    it("rejects a block listed more than once", async () => {
      const selection = { blockId: windows._id.toString(), quantity: 10 };

      await expect(
        pricing.previewPrice(published._id.toString(), [
          selection,
          selection,
          selection,
        ])
      ).rejects.toMatchObject({
        statusCode: 400,
        errorCode: "PRICING_QUANTITY_OUT_OF_RANGE",
        message: "Windows: selected more than once",
      });
    });

    it("hides unpublished services", async () => {
      await expect(
        pricing.previewPrice(draft._id.toString(), [])
      ).rejects.toMatchObject({ errorCode: "SERVICE_NOT_FOUND" });
    });
  });
});
