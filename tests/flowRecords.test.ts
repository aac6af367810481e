import { describe, expect, it } from "vitest";
import { compareRecordLines, normalizeFlowDump } from "../src/normalize/flowRecords";

const HEADER = "Date first seen          Duration Proto      Src IP Addr:Port          Dst IP Addr:Port   Flags Tos  Packets    Bytes Flows";
const SUMMARY = [
  "Summary: total flows: 3, total bytes: 3120, total packets: 24, avg bps: 512, avg pps: 3, avg bpp: 130",
  "Time window: 2018-12-01 09:18:10 - 2018-12-01 09:20:41",
  "Total flows processed: 3, Blocks skipped: 0, Bytes read: 420",
  "Sys: 0.002s flows/second: 1250.0     Wall: 0.001s flows/second: 2400.0"
].join("\n");

const RECORDS = [
  "2018-12-01 09:19:02.113     0.000 UDP     192.168.50.1:53    ->   192.168.50.6:51123 ......   0        1       92     1",
  "2018-12-01 09:18:10.004     2.514 TCP     192.168.50.6:40422 ->     172.16.0.5:80    .AP.SF   0       12     1640     1",
  "2018-12-01 09:20:41.870     1.002 TCP     192.168.50.7:40500 ->     172.16.0.5:443   .AP.SF   0       11     1388     1"
];

describe("flow dump normalization", () => {
  it("matches the documented example", () => {
    expect(normalizeFlowDump("hdr\n5 x\n2 y\n\nSummary: 2 flows\n")).toBe("2 y\n5 x\n");
  });

  it("drops the header, summary block and blank lines and sorts records", () => {
    const dump = [HEADER, ...RECORDS, "", SUMMARY, ""].join("\n");

    expect(normalizeFlowDump(dump)).toBe([RECORDS[1], RECORDS[0], RECORDS[2]].join("\n") + "\n");
  });

  it("produces the same output for any permutation of record lines", () => {
    const permutations = [
      [0, 1, 2],
      [0, 2, 1],
      [1, 0, 2],
      [1, 2, 0],
      [2, 0, 1],
      [2, 1, 0]
    ];
    const outputs = permutations.map((order) =>
      normalizeFlowDump([HEADER, ...order.map((i) => RECORDS[i]), "", SUMMARY].join("\n"))
    );

    expect(new Set(outputs).size).toBe(1);
  });

  it("never keeps a line starting with a non-digit or a blank line", () => {
    const dump = [HEADER, "  ", RECORDS[0], " 12 indented", "\t", "x9 flows", RECORDS[1], "", SUMMARY].join("\n");
    const lines = normalizeFlowDump(dump).split("\n");

    expect(lines.pop()).toBe("");
    expect(lines).toEqual([RECORDS[1], RECORDS[0]]);
    for (const line of lines) {
      expect(line).toMatch(/^\d/);
    }
  });

  it("drops the first line even when it is a record", () => {
    expect(normalizeFlowDump("7 first\n3 second\n")).toBe("3 second\n");
  });

  it("returns an empty string when only header and summary remain", () => {
    expect(normalizeFlowDump(`${HEADER}\n\n${SUMMARY}\n`)).toBe("");
    expect(normalizeFlowDump("")).toBe("");
  });

  it("handles CRLF dumps", () => {
    expect(normalizeFlowDump("hdr\r\n9 b\r\n1 a\r\nSummary\r\n")).toBe("1 a\n9 b\n");
  });

  it("sorts numerically on the leading number and by line on ties", () => {
    expect(compareRecordLines("10 a", "9 z")).toBeGreaterThan(0);
    expect(compareRecordLines("2.5 a", "2.25 a")).toBeGreaterThan(0);
    expect(compareRecordLines("3 a", "3 b")).toBeLessThan(0);
    expect(compareRecordLines("3 a", "3 a")).toBe(0);
  });
});
