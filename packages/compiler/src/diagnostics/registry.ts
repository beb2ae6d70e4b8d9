import type {
  DiagnosticHint,
  DiagnosticPhase,
  DiagnosticSeverity,
} from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  message: DiagnosticMessage<P>;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

type DiagnosticParamsMap = {
  CK0001: { kind: "unknown-in-specific"; name: string; specific: string };
  CK0002: { kind: "not-constant"; name: string };
  CK0003: { kind: "definition-unavailable"; specific: string };
  EV0001: { kind: "integer-overflow"; lhs: number; rhs: number };
  EV0002: { kind: "invalid-operand"; instruction: string; operand: string };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  CK0001: {
    code: "CK0001",
    message: (params) =>
      `value of ${params.name} is not yet known in ${params.specific}`,
    severity: "error",
    phase: "checking",
    hints: [
      {
        message:
          "Resolve the specific's region before reading its substituted values.",
      },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CK0001"]>,
  CK0002: {
    code: "CK0002",
    message: (params) => `${params.name} is not a compile-time constant`,
    severity: "error",
    phase: "checking",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CK0002"]>,
  CK0003: {
    code: "CK0003",
    message: (params) =>
      `definition of ${params.specific} is used before the generic is defined`,
    severity: "error",
    phase: "checking",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CK0003"]>,
  EV0001: {
    code: "EV0001",
    message: (params) =>
      `integer overflow evaluating ${params.lhs} + ${params.rhs}`,
    severity: "error",
    phase: "evaluation",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["EV0001"]>,
  EV0002: {
    code: "EV0002",
    message: (params) =>
      `operand ${params.operand} of ${params.instruction} has the wrong kind of value`,
    severity: "error",
    phase: "evaluation",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["EV0002"]>,
} as const;

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>,
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];
