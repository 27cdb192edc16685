import { describe, expect, it } from "vitest";
import {
  BatchCancelledError,
  ConfigError,
  SourceUnavailableError,
  StepFailedError,
  WarehouseError,
  describeError,
  engineErrorType,
} from "../../src/lib/errors.js";

describe("engineErrorType", () => {
  it("reads the DuckDB error class", () => {
    expect(engineErrorType(new Error("Constraint Error: NOT NULL constraint failed: t.c"))).toBe("Constraint");
    expect(engineErrorType(new Error("Catalog Error: Table with name x does not exist!"))).toBe("Catalog");
    expect(engineErrorType(new Error("Conversion Error: Could not convert"))).toBe("Conversion");
  });

  it("is undefined for other messages", () => {
    expect(engineErrorType(new Error("disk full"))).toBeUndefined();
    expect(engineErrorType("plain string")).toBeUndefined();
  });
});

describe("warehouse errors", () => {
  it("wraps a step failure with its cause", () => {
    const cause = new Error("Constraint Error: NOT NULL constraint failed");
    const err = new StepFailedError("crm_cust_info", cause);
    expect(err).toBeInstanceOf(WarehouseError);
    expect(err.name).toBe("StepFailedError");
    expect(err.cause).toBe(cause);
    expect(err.engineErrorType).toBe("Constraint");
    expect(err.toDiagnostic()).toEqual({
      code: "STEP_FAILED",
      severity: "error",
      step: "crm_cust_info",
      message: "Step crm_cust_info failed: Constraint Error: NOT NULL constraint failed",
    });
  });

  it("marks a missing source as fatal", () => {
    expect(describeError(new SourceUnavailableError("bronze.erp_loc_a101"))).toEqual({
      code: "SOURCE_UNAVAILABLE",
      severity: "fatal",
      step: "bronze.erp_loc_a101",
      message: "Source table bronze.erp_loc_a101 is missing or unreadable",
    });
  });

  it("marks cancellation as a warning", () => {
    expect(describeError(new BatchCancelledError("erp_cust_az12"))).toEqual({
      code: "BATCH_CANCELLED",
      severity: "warning",
      step: "erp_cust_az12",
      message: "Batch cancelled before erp_cust_az12",
    });
  });

  it("omits the step when there is none", () => {
    expect(describeError(new ConfigError("bad mode"))).toEqual({
      code: "CONFIG_INVALID",
      severity: "error",
      message: "bad mode",
    });
  });

  it("describes foreign errors as unexpected", () => {
    expect(describeError(new TypeError("nope"))).toEqual({ code: "UNEXPECTED", severity: "error", message: "nope" });
    expect(describeError(42)).toEqual({ code: "UNEXPECTED", severity: "error", message: "42" });
  });
});
