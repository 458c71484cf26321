import { describe, expect, test } from "vitest";
import {
  color,
  formatSummary,
  formatTableRow,
  formatTableSeparator,
  TABLE_WIDTHS,
  ui,
} from "../../src/cli/ui";

describe("CLI UI utilities", () => {
  describe("ui object", () => {
    test("has all required methods", () => {
      expect(typeof ui.intro).toBe("function");
      expect(typeof ui.outro).toBe("function");
      expect(typeof ui.cancel).toBe("function");
      expect(typeof ui.info).toBe("function");
      expect(typeof ui.success).toBe("function");
      expect(typeof ui.warn).toBe("function");
      expect(typeof ui.error).toBe("function");
      expect(typeof ui.step).toBe("function");
      expect(typeof ui.message).toBe("function");
      expect(typeof ui.confirm).toBe("function");
      expect(typeof ui.spinner).toBe("function");
      expect(typeof ui.isCancel).toBe("function");
      expect(typeof ui.note).toBe("function");
    });
  });

  describe("ui object keys", () => {
    test("exposes only the helpers the commands use", () => {
      expect(Object.keys(ui).sort()).toEqual([
        "cancel",
        "confirm",
        "error",
        "info",
        "intro",
        "isCancel",
        "message",
        "note",
        "outro",
        "spinner",
        "step",
        "success",
        "warn",
      ]);
    });
  });

  describe("formatSummary", () => {
    test("pads labels to the longest one", () => {
      const lines = formatSummary([
        { label: "Type", value: "full" },
        { label: "Backup ID", value: "2025-06-01_12-00-00_full" },
      ]).split("\n");

      expect(lines).toEqual([
        `${color.dim("Type     ")}  full`,
        `${color.dim("Backup ID")}  2025-06-01_12-00-00_full`,
      ]);
    });

    test("drops null and undefined values", () => {
      const result = formatSummary([
        { label: "Pruned", value: 2 },
        { label: "Parent", value: null },
        { label: "Chain", value: undefined },
      ]);

      expect(result).toBe(`${color.dim("Pruned")}  2`);
    });
  });

  describe("table formatting", () => {
    test("pads each column to its width", () => {
      const row = formatTableRow(["ID", "Type"], [4, 6]);

      expect(row).toBe(`ID  ${color.dim(" │ ")}Type  `);
    });

    test("builds a separator matching the widths", () => {
      expect(formatTableSeparator([2, 3])).toBe(color.dim("───┼────"));
    });

    test("fits a backup id in the id column", () => {
      const id = "2025-06-01_12-00-00_incremental";
      const row = formatTableRow([id], [TABLE_WIDTHS.backupId]);

      expect(row.startsWith(id)).toBe(true);
    });
  });
});
