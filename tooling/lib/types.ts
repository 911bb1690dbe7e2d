/**
 * Shared type definitions for the stub synthesis engine
 */

import { PrimitiveName } from "./ast";
import { LogLevel } from "./logger";

// -----------------------------------------------------------------------------
// Configuration
// -----------------------------------------------------------------------------

export type TargetLanguageVersion = 8 | 11 | 17 | 21;

export type RelocationRule = {
  from: string;
  to: string;
};

export type Config = {
  envSearchPaths?: string[];
  failOnAmbiguity?: boolean;
  minimalStubbing?: boolean;
  preserveGenerics?: boolean;
  targetLanguageVersion?: TargetLanguageVersion;
  logLevel?: LogLevel;
  maxContextTypes?: number;
  maxTraversalDepth?: number;
  shimCatalogPath?: string;
  relocatedPackages?: RelocationRule[];
  outputDir?: string;
};

export type SynthesisOptions = {
  failOnAmbiguity: boolean;
  minimalStubbing: boolean;
  preserveGenerics: boolean;
  targetLanguageVersion: TargetLanguageVersion;
  maxContextTypes: number;
  maxTraversalDepth: number;
  relocatedPackages: RelocationRule[];
};

// -----------------------------------------------------------------------------
// Type shapes
// -----------------------------------------------------------------------------

export type WildcardVariance = "extends" | "super";

export type TypeShape =
  | { kind: "primitive"; name: PrimitiveName }
  | { kind: "named"; qualifiedName: string; typeArgs: TypeShape[] }
  | { kind: "array"; of: TypeShape }
  | { kind: "wildcard"; bound?: { variance: WildcardVariance; shape: TypeShape } }
  | { kind: "typeVariable"; name: string }
  | { kind: "null" }
  | { kind: "top" };

export type NamedShape = Extract<TypeShape, { kind: "named" }>;

// -----------------------------------------------------------------------------
// Usage evidence
// -----------------------------------------------------------------------------

export type ReferenceKind = "TYPE" | "METHOD" | "FIELD" | "CONSTRUCTOR";

export type CallShape =
  | "CALL"
  | "FIELD_ACCESS"
  | "CONSTRUCTION"
  | "LAMBDA_TARGET"
  | "METHOD_REFERENCE_TARGET"
  | "TYPE_USE"
  | "OVERRIDE"
  | "ANNOTATION_ELEMENT";

export type UsageIdiom =
  | "switch-label"
  | "qualified-constant"
  | "enum-collection"
  | "field-write"
  | "extends"
  | "implements"
  | "interface-extends"
  | "anonymous-subclass"
  | "annotation"
  | "thrown"
  | "caught"
  | "resource"
  | "iterated"
  | "assigned-to"
  | "class-literal"
  | "cast"
  | "instanceof"
  | "declared-type"
  | "type-argument"
  | "bound"
  | "secondary-bound"
  | "constructed"
  | "string-conversion";

export type UsageLocation = {
  unit: string;
  packageName: string;
  enclosingType?: string;
  member?: string;
};

export type MethodSignatureShape = {
  name: string;
  params: TypeShape[];
  returns: TypeShape;
};

export type UsageSite = {
  location: UsageLocation;
  callShape: CallShape;
  argumentShapes: TypeShape[];
  /** Shape the surrounding code expects; absent when nothing constrains it. */
  expectedResultUsage?: TypeShape;
  typeArguments: TypeShape[];
  isStaticContext: boolean;
  idioms: UsageIdiom[];
  receiverTypeArguments?: TypeShape[];
  /** Anonymous-subclass bodies: the methods the body declares. */
  overriddenMethods?: MethodSignatureShape[];
  /** Implementing classes: `name/arity` keys of every method the implementor declares. */
  implementorMethods?: string[];
  /** Method references whose referenced method could not be typed. */
  arityUnknown?: boolean;
  /** Overriding declarations: the visibility the fragment gives the method. */
  declaredVisibility?: Visibility;
};

export type OwnerHint =
  | { kind: "package"; packageName: string }
  | { kind: "unqualified"; callerPackage: string }
  | { kind: "type"; qualifiedName: string };

export type UnresolvedReference = {
  kind: ReferenceKind;
  ownerHint: OwnerHint;
  simpleName: string;
  evidence: UsageSite[];
};

export type ReferenceDescriptor = {
  kind: ReferenceKind;
  owner: string;
  simpleName: string;
};

// -----------------------------------------------------------------------------
// Stub plans
// -----------------------------------------------------------------------------

export type TypeKind = "CLASS" | "INTERFACE" | "ANNOTATION" | "ENUM" | "RECORD";

export type Visibility = "public" | "protected" | "package" | "private";

export type TypeParameterPlan = {
  name: string;
  bounds: TypeShape[];
};

export type SupertypePlan = {
  relation: "extends" | "implements";
  shape: NamedShape;
};

export type RecordComponentPlan = {
  name: string;
  type: TypeShape;
};

export type TypePlan = {
  plan: "type";
  qualifiedName: string;
  packageName: string;
  simpleName: string;
  enclosing?: string;
  kind: TypeKind;
  typeParameters: TypeParameterPlan[];
  supertypes: SupertypePlan[];
  enumConstants: string[];
  recordComponents: RecordComponentPlan[];
  origin: OwnerHint;
  isAbstract?: boolean;
  functional?: boolean;
};

export type MethodPlan = {
  plan: "method";
  owner: string;
  name: string;
  paramTypes: TypeShape[];
  returnType: TypeShape;
  visibility: Visibility;
  isStatic: boolean;
  isAbstract: boolean;
  isDefault: boolean;
  varargs: boolean;
  typeParameters: TypeParameterPlan[];
  thrownTypes: TypeShape[];
};

export type FieldPlan = {
  plan: "field";
  owner: string;
  name: string;
  type: TypeShape;
  isStatic: boolean;
  isFinal: boolean;
  /** Literal value, unquoted, of a constant used as a switch label. */
  constantValue?: string;
};

export type ConstructorPlan = {
  plan: "constructor";
  owner: string;
  paramTypes: TypeShape[];
  varargs: boolean;
};

export type MemberPlan = MethodPlan | FieldPlan | ConstructorPlan;

export type StubPlan = TypePlan | MemberPlan;

export type ShimBlueprint = {
  readonly type: Readonly<TypePlan>;
  readonly members: ReadonlyArray<Readonly<MemberPlan>>;
};

// -----------------------------------------------------------------------------
// Planning and merging
// -----------------------------------------------------------------------------

export type PassName =
  | "shim-matcher"
  | "functional-interface-resolver"
  | "signature-inferrer"
  | "type-kind-classifier";

export type PlanCandidate = {
  plan: StubPlan;
  source: PassName;
  reason: string;
  /** Reported only if this candidate survives the merge. */
  notes?: Diagnostic[];
};

export type OrchestratorState = "COLLECTING" | "RESOLVING" | "MERGED";

// -----------------------------------------------------------------------------
// Diagnostics
// -----------------------------------------------------------------------------

export type DiagnosticCode =
  | "ContextBuildDegraded"
  | "UnresolvedAfterSynthesis"
  | "AmbiguousResolution"
  | "ConflictingEvidence";

export type Diagnostic =
  | { code: "ContextBuildDegraded"; message: string; cause: string }
  | { code: "UnresolvedAfterSynthesis"; message: string; reference: ReferenceDescriptor }
  | { code: "AmbiguousResolution"; message: string; simpleName: string; candidates: string[]; chosen: string; unit: string }
  | { code: "ConflictingEvidence"; message: string; identity: string; kept: PassName; discarded: PassName[] };

export type SynthesisPlan = {
  types: TypePlan[];
  methods: MethodPlan[];
  fields: FieldPlan[];
  constructors: ConstructorPlan[];
  diagnostics: Diagnostic[];
};
