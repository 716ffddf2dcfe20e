/**
 * methodcheck explain command - describe a diagnostic code
 */

import {
  type DiagnosticCode,
  type Result,
  diagnosticCategory,
} from "@methodcheck/frontend";

const DESCRIPTIONS: Readonly<Record<DiagnosticCode, string>> = {
  SIG1001:
    "A declaration carries two method-type markers (for example static-method and setter). Keep exactly one.",
  SIG1002:
    "An auxiliary option such as signature-text or name is given twice on one declaration.",
  SIG1003:
    "A module function carries a method-type marker. Method types only apply inside a type definition.",
  SIG2001:
    "A method without a receiver is neither marked static nor shaped like the reserved constructor. Add the static-method marker.",
  SIG3001:
    "The method type does not take a receiver (static methods, class methods, class attributes, constructors, module functions).",
  SIG3002:
    "Getters, setters and call protocol methods operate on an instance and need a receiver.",
  SIG3003:
    "Class attributes and getters are evaluated without arguments.",
  SIG3004: "A setter takes exactly one argument: the value being assigned.",
  SIG3005: "A class method receives the type object as its first argument.",
  SIG3006:
    "With pass-module the first argument must be a reference to the module type.",
  SIG4001:
    "Generic type parameters are rejected; each exposed method needs one concrete signature.",
  SIG4002:
    "Opaque-existential parameter types are rejected; name a concrete type instead.",
  SIG5001:
    "Signature text belongs on the enclosing type definition, not on its constructor.",
  SIG5002:
    "Getters, setters and class attributes have no call signature, so signature text does not apply.",
  SIG5003: "A constructor is always exposed under the reserved constructor name.",
  SIG5004: "pass-module only applies to functions exposed on a module.",
  SIG9001: "The batch file does not exist.",
  SIG9002: "The batch file could not be read.",
  SIG9003: "The batch file is not valid JSON.",
  SIG9004: "The batch file's top level must be a JSON object.",
  SIG9005: "The batch file needs a 'declarations' array.",
  SIG9006:
    "A declaration entry does not match the declaration model; the message names the field.",
};

const isDiagnosticCode = (code: string): code is DiagnosticCode =>
  Object.prototype.hasOwnProperty.call(DESCRIPTIONS, code);

export const explainCode = (code: string): Result<string, string> => {
  const normalized = code.toUpperCase();
  if (!isDiagnosticCode(normalized)) {
    return { ok: false, error: `Unknown diagnostic code '${code}'` };
  }

  return {
    ok: true,
    value: `${normalized} (${diagnosticCategory(normalized)}): ${DESCRIPTIONS[normalized]}`,
  };
};
