/**
 * @jest-environment jsdom
 */
import { Group, Rect } from "fabric";
import { formatFill, parseFill } from "../../src/core/fabric/color";
import { FabricScaleTarget } from "../../src/core/fabric/scaleTarget";
import { FabricVisualSource, isAttached, isInSubtree, visualKindOf } from "../../src/core/fabric/visuals";

function rect(fill: string | null, extra?: { visible?: boolean }) {
  return new Rect({ left: 0, top: 0, width: 40, height: 20, fill, ...extra });
}

describe("fill color conversion", () => {
  it("parses hex and rgba fills into 0..1 channels", () => {
    expect(parseFill("#ffffff")).toEqual({ r: 1, g: 1, b: 1, a: 1 });
    expect(parseFill("rgba(255,0,0,0.5)")).toEqual({ r: 1, g: 0, b: 0, a: 0.5 });
  });

  it("formats to an rgba string with byte channels", () => {
    expect(formatFill({ r: 0.85, g: 0.85, b: 0.85, a: 1 })).toBe("rgba(217,217,217,1)");
    expect(formatFill({ r: 1.2, g: -0.1, b: 0, a: 0.25 })).toBe("rgba(255,0,0,0.25)");
  });

  it("keeps alpha precision and flushes tiny alpha to zero", () => {
    expect(formatFill({ r: 0, g: 0, b: 0, a: 0.1234 })).toBe("rgba(0,0,0,0.1234)");
    expect(formatFill({ r: 0, g: 0, b: 0, a: 1e-9 })).toBe("rgba(0,0,0,0)");
  });
});

describe("FabricVisualSource", () => {
  it("collects filled shapes in the subtree, hidden ones included", () => {
    const a = rect("#ff0000");
    const hidden = rect("#00ff00", { visible: false });
    const inner = rect("#0000ff");
    const noFill = rect(null);
    const root = new Group([a, hidden, new Group([inner]), noFill]);
    const source = new FabricVisualSource(root);

    const images = [...source.collect("image")];

    expect(images.map((v) => v?.obj)).toEqual([a, hidden, inner]);
    expect([...source.collect("text")]).toEqual([]);
  });

  it("hands out one visual per object", () => {
    const a = rect("#ff0000");
    const source = new FabricVisualSource(new Group([a]));

    const [first] = [...source.collect("image")];
    expect(source.visualFor(a)).toBe(first);
    expect(source.visualFor(null)).toBeNull();
  });

  it("treats an object that left the subtree as dead", () => {
    const a = rect("#ff0000");
    const root = new Group([a]);
    const visual = new FabricVisualSource(root).visualFor(a);

    expect(visual?.isAlive()).toBe(true);
    root.remove(a);
    expect(isInSubtree(a, root)).toBe(false);
    expect(visual?.isAlive()).toBe(false);
  });

  it("writes colors back into fill", () => {
    const a = rect("#ffffff");
    const visual = new FabricVisualSource(a).visualFor(a);

    visual?.setColor({ r: 0.5, g: 0.25, b: 0, a: 1 });

    expect(a.fill).toBe("rgba(128,64,0,1)");
    expect(visual?.getColor()).toEqual({ r: 128 / 255, g: 64 / 255, b: 0, a: 1 });
  });

  it("writes the authored fill back when its color comes back", () => {
    const a = rect("#ffffff");
    const visual = new FabricVisualSource(a).visualFor(a);
    const original = visual?.getColor();

    visual?.setColor({ r: 0.5, g: 0.5, b: 0.5, a: 1 });
    if (original) visual?.setColor(original);

    expect(a.fill).toBe("#ffffff");
  });

  it("treats an included object outside the subtree and off canvas as dead", () => {
    const root = new Group([rect("#ffffff")]);
    const outside = rect("#ff0000");

    expect(isAttached(outside, root)).toBe(false);
    expect(new FabricVisualSource(root).visualFor(outside)?.isAlive()).toBe(false);
  });

  it("classifies groups and fill-less objects as non visual", () => {
    expect(visualKindOf(new Group([]))).toBeNull();
    expect(visualKindOf(rect(null))).toBeNull();
    expect(visualKindOf(rect("#123456"))).toBe("image");
  });
});

describe("FabricScaleTarget", () => {
  it("scales around the object center", () => {
    const r = new Rect({ left: 10, top: 20, width: 100, height: 50, strokeWidth: 0 });
    const target = new FabricScaleTarget(r);
    const before = r.getCenterPoint();

    target.setScale({ x: 0.5, y: 0.5, z: 1 });

    const after = r.getCenterPoint();
    expect(target.getScale()).toEqual({ x: 0.5, y: 0.5, z: 1 });
    expect(after.x).toBeCloseTo(before.x, 6);
    expect(after.y).toBeCloseTo(before.y, 6);
    expect(r.left).toBeCloseTo(35, 6);
    expect(r.top).toBeCloseTo(32.5, 6);
  });
});
