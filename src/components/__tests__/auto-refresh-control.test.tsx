import { describe, it, expect, vi } from "vitest";
import { render, screen, fireEvent } from "@testing-library/react";
import { AutoRefreshControl } from "../auto-refresh-control";

describe("AutoRefreshControl", () => {
  it("starts with a valid interval", () => {
    const onChange = vi.fn();
    render(<AutoRefreshControl onChange={onChange} />);

    fireEvent.change(screen.getByLabelText("Auto-refresh (sec):"), {
      target: { value: "30" },
    });
    fireEvent.click(screen.getByRole("button", { name: "Start Auto-Refresh" }));

    expect(onChange).toHaveBeenCalledWith(30000);
    const stop = screen.getByRole("button", { name: "Stop Auto-Refresh" });
    expect(stop).toHaveAttribute("aria-pressed", "true");
    expect(screen.getByLabelText("Auto-refresh (sec):")).toBeDisabled();
  });

  it("stops on the second press", () => {
    const onChange = vi.fn();
    render(<AutoRefreshControl onChange={onChange} />);

    fireEvent.change(screen.getByLabelText("Auto-refresh (sec):"), {
      target: { value: "5" },
    });
    fireEvent.click(screen.getByRole("button", { name: "Start Auto-Refresh" }));
    fireEvent.click(screen.getByRole("button", { name: "Stop Auto-Refresh" }));

    expect(onChange).toHaveBeenLastCalledWith(null);
    expect(screen.getByRole("button", { name: "Start Auto-Refresh" })).toHaveAttribute(
      "aria-pressed",
      "false"
    );
  });

  it("rejects an invalid interval and clears the input", () => {
    const onChange = vi.fn();
    render(<AutoRefreshControl onChange={onChange} />);

    const input = screen.getByLabelText<HTMLInputElement>("Auto-refresh (sec):");
    fireEvent.change(input, { target: { value: "0" } });
    fireEvent.click(screen.getByRole("button", { name: "Start Auto-Refresh" }));

    expect(onChange).not.toHaveBeenCalled();
    expect(input.value).toBe("");
    expect(
      screen.getByText("Invalid refresh interval. Please enter a number ≥ 1.")
    ).toBeInTheDocument();
  });
});
