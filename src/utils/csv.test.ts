import { describe, expect, it } from "vitest";
import { renderTable } from "../cli/table";
import { escapeCsvField, toCsv, toCsvLine } from "./csv";

describe("escapeCsvField", () => {
  it("leaves plain values alone", () => {
    expect(escapeCsvField("Hall A 210")).toBe("Hall A 210");
    expect(escapeCsvField(42)).toBe("42");
    expect(escapeCsvField(true)).toBe("yes");
  });

  it("writes null as an empty field", () => {
    expect(escapeCsvField(null)).toBe("");
  });

  it("quotes fields with commas, quotes or line breaks", () => {
    expect(escapeCsvField("Reyes, Marta")).toBe('"Reyes, Marta"');
    expect(escapeCsvField('The "Lab"')).toBe('"The ""Lab"""');
    expect(escapeCsvField("line one\nline two")).toBe('"line one\nline two"');
    expect(escapeCsvField("a\rb")).toBe('"a\rb"');
  });
});

describe("toCsv", () => {
  it("writes a header plus one line per row and ends with a newline", () => {
    const csv = toCsv({
      columns: ["ID", "Name", "Salary"],
      rows: [
        [1, "Reyes, Marta", 78000],
        [2, "Tobi Okafor", null],
      ],
    });

    expect(csv).toBe('ID,Name,Salary\n1,"Reyes, Marta",78000\n2,Tobi Okafor,\n');
    expect(csv.trimEnd().split("\n")).toHaveLength(3);
  });

  it("writes flags the way the console table shows them", () => {
    const table = {
      title: "Faculty",
      columns: ["Name", "Active"],
      rows: [
        ["Reyes", true],
        ["Okafor", false],
      ],
    };
    expect(toCsv(table)).toBe("Name,Active\nReyes,yes\nOkafor,no\n");
    expect(renderTable(table).slice(-2)).toEqual(["Reyes   yes", "Okafor  no"]);
  });

  it("writes only the header for an empty table", () => {
    expect(toCsv({ columns: ["Room", "Classes"], rows: [] })).toBe("Room,Classes\n");
  });

  it("joins a single line with commas", () => {
    expect(toCsvLine(["a", 1, null, false])).toBe("a,1,,no");
  });
});
