import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";
import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";

import type { RateRequestV1 } from "../runtime/types.js";

export const RATE_REQUEST_SCHEMA_FILE = "rate_request_v1.schema.json";

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

/** Validation outcome that hands back the request typed once it conforms. */
export type CheckedRequest =
  | { valid: true; request: RateRequestV1; validation: ValidationResult }
  | { valid: false; validation: ValidationResult };

type AjvError = { instancePath?: string; message?: string };

// Compiled from the RATE_V1 schema, so a passing value is a RateRequestV1
type AjvValidateFunction = ((data: unknown) => data is RateRequestV1) & {
  errors?: AjvError[] | null;
};

type AjvValidator = {
  compile: (schema: unknown) => AjvValidateFunction;
  errors?: AjvError[] | null;
};

type RequestValidator = (data: unknown) => data is RateRequestV1;

let validator: RequestValidator | null = null;
let validatorErrors: AjvError[] | null = null;

export function contractsDir(): string {
  // In production the contracts directory may be mounted elsewhere
  const override = process.env.CONTRACTS_DIR?.trim();
  if (override) {
    return override;
  }
  return join(dirname(fileURLToPath(import.meta.url)), "..", "..", "..", "..", "contracts");
}

function getValidator(): RequestValidator {
  if (validator) {
    return validator;
  }

  const schemaPath = join(contractsDir(), RATE_REQUEST_SCHEMA_FILE);
  const schema = JSON.parse(readFileSync(schemaPath, "utf8")) as Record<string, unknown>;

  const AjvConstructor = Ajv2020 as unknown as new (opts: Record<string, unknown>) => AjvValidator;
  const ajv = new AjvConstructor({ strict: true, allErrors: true });
  const addFormatsPlugin = addFormats as unknown as (instance: AjvValidator) => void;
  addFormatsPlugin(ajv);

  const validate = ajv.compile(schema);
  validator = (data: unknown): data is RateRequestV1 => {
    const isValid = validate(data);
    validatorErrors = validate.errors ?? null;
    return isValid;
  };

  return validator;
}

const CALCULATION_PATH = /^\/calculations\/(\d+)(?:\/|$)/;

// Names the calculation kind an error belongs to, when the request carries one
function calculationKind(request: unknown, instancePath: string): string | null {
  const match = CALCULATION_PATH.exec(instancePath);
  if (!match?.[1] || typeof request !== "object" || request === null || !("calculations" in request)) {
    return null;
  }
  const { calculations } = request;
  if (!Array.isArray(calculations)) {
    return null;
  }
  const calculation: unknown = calculations[Number(match[1])];
  if (typeof calculation !== "object" || calculation === null || !("kind" in calculation)) {
    return null;
  }
  return typeof calculation.kind === "string" ? calculation.kind : null;
}

function formatError(request: unknown, error: AjvError): string {
  const path = error.instancePath && error.instancePath.length > 0 ? error.instancePath : "/";
  const message = error.message ?? "invalid";
  const kind = calculationKind(request, path);
  return kind ? `${path} [${kind}]: ${message}` : `${path}: ${message}`;
}

export function checkRequest(request: unknown): CheckedRequest {
  try {
    const validate = getValidator();
    if (validate(request)) {
      return { valid: true, request, validation: { valid: true, errors: [] } };
    }

    const errors = (validatorErrors ?? []).map((error) => formatError(request, error));
    return { valid: false, validation: { valid: false, errors } };
  } catch (error) {
    return {
      valid: false,
      validation: {
        valid: false,
        errors: [error instanceof Error ? error.message : "Validation failed"],
      },
    };
  }
}

export function validateRequest(request: unknown): ValidationResult {
  return checkRequest(request).validation;
}
