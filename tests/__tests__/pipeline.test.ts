import { describe, test, expect, vi, afterEach } from "vitest";
import { buildSaveBatch, loadSession, saveSession } from "../../src/core/pipeline";
import { decodeRangeCollection } from "../../src/adapters/range-collection";
import { decodeHighlightToggle } from "../../src/adapters/highlight-collection";
import { decodeColorPreset } from "../../src/adapters/preset-reader";
import { NotFoundError, StructureError } from "../../src/core/errors";
import { HIGHLIGHT_LABELS } from "../../src/core/constants";
import type { Document } from "../../src/core/document";
import { MemoryContainer, collectionDoc, presetDoc, rgba } from "./fixtures";

const BOUNDS = [0, 1, 5, 10, 15, 20];
const LABELS = ["unset", "low", "r1", "r2", "r3", "r4"];
const COLORS = LABELS.map((_, i) => rgba(i / 10, 0, 0));
const STANDARD = [...HIGHLIGHT_LABELS.standard];
const NO_BORDER = [...HIGHLIGHT_LABELS.noBorder];

const COLLECTION = "AttributeDataCollection";
const HL_STANDARD = "AttributeHighlightTypeDataCollection";
const HL_NO_BORDER = "AttributeHighlightTypeNoBorderDataCollection";
const PRESET = "AttributeColoursDefault";
const ALT_PRESET = "AttributeColoursAlternative";

function makeSource(
    data: Record<string, Document> = {
        [COLLECTION]: collectionDoc(BOUNDS, LABELS),
        [HL_STANDARD]: collectionDoc([0, 1, 2], STANDARD),
        [HL_NO_BORDER]: collectionDoc([0, 1, 2], NO_BORDER),
    },
    styles: Record<string, Document> = {
        [PRESET]: presetDoc(COLORS, LABELS),
        [ALT_PRESET]: presetDoc(COLORS, LABELS),
    }
) {
    return { data: new MemoryContainer(data), styles: new MemoryContainer(styles) };
}

describe("session pipeline", () => {
    const consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const consoleWarnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});

    afterEach(() => {
        consoleLogSpy.mockClear();
        consoleWarnSpy.mockClear();
    });

    test("loads the editable rows with their preset colors", async () => {
        const session = await loadSession(makeSource());
        expect(session.table.boundaries()).toEqual([5, 10, 15, 20]);
        expect(session.table.allLabels()).toEqual(LABELS);
        expect(session.table.colors()[0]).toEqual(rgba(0.2, 0, 0));
        expect(session.highlight).toBe(true);
        expect(Object.keys(session.originals.presets)).toEqual([PRESET]);
        expect(consoleLogSpy).toHaveBeenCalledWith(`Loaded ${COLLECTION}: 6 rows`);
    });

    test("a missing rating collection is an error", async () => {
        const source = makeSource({});
        await expect(loadSession(source)).rejects.toBeInstanceOf(NotFoundError);
        await expect(loadSession(source)).rejects.toThrow(
            "AttributeDataCollection not found in data container"
        );
    });

    test("a missing preset leaves every range white", async () => {
        const source = makeSource(undefined, {});
        const session = await loadSession(source);
        expect(session.table.allColors()).toEqual(LABELS.map(() => rgba(1, 1, 1)));
        expect(consoleWarnSpy).toHaveBeenCalledWith(
            `Warning: ${PRESET} not found; every range starts white`
        );
        expect(buildSaveBatch(session).styles).toEqual({});
    });

    test("a short preset is padded with white", async () => {
        const source = makeSource(undefined, {
            [PRESET]: presetDoc(COLORS.slice(0, 4), LABELS.slice(0, 4)),
        });
        const session = await loadSession(source);
        expect(session.table.colors()).toEqual([
            rgba(0.2, 0, 0),
            rgba(0.3, 0, 0),
            rgba(1, 1, 1),
            rgba(1, 1, 1),
        ]);
    });

    test("highlight follows the standard collection when present", async () => {
        const base = STANDARD[0];
        const disabled = await loadSession(
            makeSource({
                [COLLECTION]: collectionDoc(BOUNDS, LABELS),
                [HL_STANDARD]: collectionDoc([0, 1, 2], [base, base, base]),
            })
        );
        expect(disabled.highlight).toBe(false);

        const nb = NO_BORDER[0];
        const onlyNoBorder = await loadSession(
            makeSource({
                [COLLECTION]: collectionDoc(BOUNDS, LABELS),
                [HL_NO_BORDER]: collectionDoc([0, 1, 2], [nb, nb, nb]),
            })
        );
        expect(onlyNoBorder.highlight).toBe(true);
        expect(Object.keys(buildSaveBatch(onlyNoBorder).data)).toEqual([COLLECTION, HL_NO_BORDER]);
    });

    test("saving writes every container once with the edited state", async () => {
        const source = makeSource();
        const session = await loadSession(source);
        session.table.setBoundary(0, 7);
        session.table.appendRange();
        session.highlight = false;

        await saveSession(session, source);

        expect(source.data.writes).toHaveLength(1);
        expect(Object.keys(source.data.writes[0]).sort()).toEqual(
            [COLLECTION, HL_NO_BORDER, HL_STANDARD].sort()
        );
        expect(source.styles.writes).toHaveLength(1);
        expect(Object.keys(source.styles.writes[0])).toEqual([PRESET]);

        const written = await source.data.readObject(COLLECTION);
        expect(written && decodeRangeCollection(written)).toEqual({
            boundaries: [0, 1, 7, 10, 15, 19, 20],
            labels: ["unset", "low", "r1", "r2", "r3", "attribute-colour-custom-1", "r4"],
        });

        const hl = await source.data.readObject(HL_NO_BORDER);
        expect(hl && decodeHighlightToggle(hl, "noBorder").enabled).toBe(false);

        const preset = await source.styles.readObject(PRESET);
        const decoded = preset && decodeColorPreset(preset);
        expect(decoded && decoded.labels[5]).toBe("attribute-colour-custom-1");
        expect(decoded && decoded.colors[5]).toEqual(rgba(0.4, 0, 0));
        expect(decoded && decoded.colors).toHaveLength(7);

        expect(await source.styles.readObject(ALT_PRESET)).toEqual(presetDoc(COLORS, LABELS));
    });

    test("extra presets named for writing are rewritten too", async () => {
        const source = makeSource();
        const opts = { writePresets: [ALT_PRESET, "Missing"] };
        const session = await loadSession(source, opts);
        expect(consoleWarnSpy).toHaveBeenCalledWith("Warning: Missing not found; it will not be rewritten");

        const batch = await saveSession(session, source, opts);
        expect(Object.keys(batch.styles)).toEqual([PRESET, ALT_PRESET]);
    });

    test("a validation failure writes nothing", async () => {
        const broken = presetDoc(COLORS, LABELS);
        broken["floats"] = ["bad"];
        const source = makeSource(undefined, { [PRESET]: broken });
        const session = await loadSession(source);

        await expect(saveSession(session, source)).rejects.toBeInstanceOf(StructureError);
        await expect(saveSession(session, source)).rejects.toThrow("root.floats[0]");
        expect(source.data.writes).toHaveLength(0);
        expect(source.styles.writes).toHaveLength(0);
    });
});
