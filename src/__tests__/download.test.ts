import { describe, it, expect, vi, afterEach } from "vitest";
import { downloadText, REVOKE_DELAY_MS } from "../lib/download";

describe("downloadText", () => {
  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("keeps the object URL alive until after the click", () => {
    vi.useFakeTimers();
    const link = { href: "", download: "", click: vi.fn() };
    vi.stubGlobal("document", { createElement: vi.fn(() => link) });
    vi.spyOn(URL, "createObjectURL").mockReturnValue("blob:test-url");
    const revoke = vi.spyOn(URL, "revokeObjectURL").mockImplementation(() => {});

    downloadText("a,b\n1,2", "enriched_property_data_full_report.csv");

    expect(link.click).toHaveBeenCalledTimes(1);
    expect(link.href).toBe("blob:test-url");
    expect(link.download).toBe("enriched_property_data_full_report.csv");
    expect(revoke).not.toHaveBeenCalled();

    vi.advanceTimersByTime(REVOKE_DELAY_MS);

    expect(revoke).toHaveBeenCalledWith("blob:test-url");
  });
});
