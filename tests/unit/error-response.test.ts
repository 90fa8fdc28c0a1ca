import { describe, it } from "node:test";
import assert from "node:assert";
import {
  errorToResponse,
  CollaboratorFailureError,
  ConfigError,
  ErrorCode,
  MalformedInputError,
  SolverFailureError,
  UnknownIdentifierError,
  isPcstError,
} from "../../src/pcst/errors.js";

describe("errorToResponse", () => {
  it("should preserve error message for plain errors", () => {
    const response = errorToResponse(new Error("something failed"));
    assert.deepStrictEqual(response, { error: { message: "something failed" } });
  });

  it("should stringify non-error values", () => {
    assert.deepStrictEqual(errorToResponse("plain text"), {
      error: { message: "plain text" },
    });
  });

  it("should preserve error code from typed errors", () => {
    const response = errorToResponse(new MalformedInputError("edge row 1: source is null"));
    assert.deepStrictEqual(response, {
      error: {
        message: "edge row 1: source is null",
        code: ErrorCode.MALFORMED_INPUT,
      },
    });
  });

  it("should include role and id for unknown identifiers", () => {
    const response = errorToResponse(new UnknownIdentifierError("root", "Z"));
    assert.deepStrictEqual(response, {
      error: {
        message: 'Unknown root identifier "Z": it does not appear in any edge row',
        code: ErrorCode.UNKNOWN_IDENTIFIER,
        role: "root",
        id: "Z",
      },
    });
  });

  it("should include the solver diagnostic verbatim", () => {
    const response = errorToResponse(
      new SolverFailureError("Root node 0 is not connected to any edges"),
    );
    assert.strictEqual(response.error.diagnostic, "Root node 0 is not connected to any edges");
    assert.strictEqual(response.error.code, ErrorCode.SOLVER_FAILURE);
  });

  it("should name the failing query role", () => {
    const cause = new Error("disk I/O error");
    const error = new CollaboratorFailureError("prizes", cause);
    assert.strictEqual(error.cause, cause);
    assert.deepStrictEqual(errorToResponse(error), {
      error: {
        message: "The prizes query failed: disk I/O error",
        code: ErrorCode.COLLABORATOR_FAILURE,
        role: "prizes",
      },
    });
  });
});

describe("isPcstError", () => {
  it("recognizes every typed error and nothing else", () => {
    assert.strictEqual(isPcstError(new ConfigError("x")), true);
    assert.strictEqual(isPcstError(new SolverFailureError("x")), true);
    assert.strictEqual(isPcstError(new Error("x")), false);
    assert.strictEqual(isPcstError(undefined), false);
  });
});
