import {
  quantityBlock,
  toggleBlock,
  typeChoiceBlock,
} from "../../../test/factories";

import { buildSelections } from "./pricing-selection.builder";

describe("buildSelections", () => {
  const windows = quantityBlock(
    { name: "Windows", unitPrice: 25 },
    { semanticKey: "window" }
  );
  const petHair = toggleBlock(
    { name: "Pet hair", percentageIncrease: 15 },
    { semanticKey: "pet_hair" }
  );
  const fabric = typeChoiceBlock({
    name: "Fabric",
    options: [{ name: "cotton", price: 40 }],
  });
  const blocks = [windows, petHair, fabric];

  const id = (block: { _id: { toString(): string } }) => block._id.toString();

  it("maps parameters to blocks by semantic key", () => {
    expect(
      buildSelections(blocks, { windowCount: 5, petHair: true })
    ).toEqual([
      { blockId: id(windows), quantity: 5 },
      { blockId: id(petHair), enabled: true },
    ]);
  });

  it("ignores parameters without a matching block", () => {
    expect(buildSelections(blocks, { pillowCount: 3, rugWidth: 2 })).toEqual(
      []
    );
  });

  it("lets an explicit selection replace the derived one", () => {
    expect(
      buildSelections(blocks, { windowCount: 5 }, [
        { blockId: id(windows), quantity: 2 },
      ])
    ).toEqual([{ blockId: id(windows), quantity: 2 }]);
  });

  it("keeps block order for explicit selections and appends unknown ones", () => {
    const unknown = { blockId: "ffffffffffffffffffffffff", quantity: 1 };

    expect(
      buildSelections(blocks, { windowCount: 1 }, [
        unknown,
        { blockId: id(fabric), selectedType: "cotton" },
      ])
    ).toEqual([
      { blockId: id(windows), quantity: 1 },
      { blockId: id(fabric), selectedType: "cotton" },
      unknown,
    ]);
  });

  it("turns a count on a toggle block into an enabled flag", () => {
    const rugToggle = toggleBlock(
      { name: "Rug", percentageIncrease: 5 },
      { semanticKey: "rug" }
    );

    expect(buildSelections([rugToggle], { rugCount: 2 })).toEqual([
      { blockId: id(rugToggle), enabled: true },
    ]);
    expect(buildSelections([rugToggle], { rugCount: 0 })).toEqual([
      { blockId: id(rugToggle), enabled: false },
    ]);
  });

  it("turns a flag on a quantity block into a quantity of one", () => {
    const base = quantityBlock(
      { name: "Base cleaning", unitPrice: 60 },
      { semanticKey: "base_cleaning" }
    );

    expect(buildSelections([base], { baseCleaning: true })).toEqual([
      { blockId: id(base), quantity: 1 },
    ]);
  });
});
