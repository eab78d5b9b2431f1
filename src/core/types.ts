/**
 * Core types for the Tailor Shop simulation
 * State snapshots, controllable inputs, warnings and model configuration
 */

import type { RNGState } from './rng.js';

// ============================================================================
// Controllable Inputs
// ============================================================================

/**
 * Decisions a player (or agent) submits for one period
 */
export interface ControllableInputs {
  price: number; // unit sale price
  materialPurchase: number; // units of raw material ordered
  advertising: number; // advertising spend
  wage: number; // wage per worker
  workerDelta: number; // signed: hires (+) / fires (-)
  machineDelta: number; // signed: purchases (+) / sales (-)
  maintenance: number; // maintenance spend
}

export type InputField = keyof ControllableInputs;

export interface InputRange {
  min: number;
  max: number;
}

/**
 * Upper limits for each decision. Lower limits are 0 for spend fields
 * and -current count for the signed deltas.
 */
export interface InputLimitsConfig {
  maxPrice: number;
  maxMaterialPurchase: number;
  maxAdvertising: number;
  maxWage: number;
  maxHiresPerPeriod: number;
  maxMachinePurchasesPerPeriod: number;
  maxMaintenance: number;
}

/**
 * Optional control granularity (e.g. wage in steps of 100)
 */
export interface InputStepsConfig {
  enabled: boolean;
  steps: Record<InputField, number>;
}

// ============================================================================
// Warnings
// ============================================================================

export type SimulationWarning =
  | { code: 'input_clamped'; field: InputField; requested: number; applied: number }
  | { code: 'material_shortfall'; capacity: number; produced: number; shortfall: number }
  | { code: 'lost_sales'; demand: number; sold: number; lost: number }
  | { code: 'workforce_depleted'; previousWorkers: number; demand: number }
  | { code: 'low_cash'; cash: number; creditFactor: number }
  | { code: 'storage_overflow'; capacity: number; discarded: number };

export type WarningCode = SimulationWarning['code'];

// ============================================================================
// State Slices
// ============================================================================

export interface InventoryState {
  materialStock: number; // units, >= 0
  finishedStock: number; // units, 0..storageCapacity
  storageCapacity: number;
}

export interface WorkforceState {
  workers: number; // integer >= 0
  motivation: number; // 0..100, neutral 50
  wage: number;
}

export interface MachineState {
  machines: number; // integer >= 0
  wear: number; // 0..100
  maintenanceBacklog: number; // money units of maintenance owed
}

export interface ProductionState {
  labourCapacity: number;
  machineCapacity: number;
  capacity: number; // min of labour and machine capacity
  materialLimit: number; // units the material on hand allows
  unitsProduced: number;
  idleRatio: number; // 0..1
}

export interface CommercialState {
  price: number;
  advertising: number;
  awareness: number; // 0..100
  demand: number;
  stockAvailable: number; // finished goods on offer this period
  unitsSold: number;
  lostSales: number;
  materialPrice: number; // price of material for the next purchase
}

export interface CostBreakdown {
  material: number;
  wages: number;
  advertising: number;
  maintenance: number;
  machines: number; // negative when machines are sold
  storage: number;
  interest: number; // negative when deposits earn interest
  benefits: number;
  rent: number; // outlets plus premises
}

export interface FinancialState {
  cash: number; // may be negative (debt)
  revenue: number;
  cost: number;
  costs: CostBreakdown;
  profit: number;
  cumulativeProfit: number;
  creditFactor: number; // 0..1, scales next period's purchase ceilings
  companyValue: number;
}

/**
 * Full snapshot after a period. Snapshots in history are deeply frozen.
 */
export interface ShopState {
  period: number;
  inventory: InventoryState;
  workforce: WorkforceState;
  machines: MachineState;
  production: ProductionState;
  commercial: CommercialState;
  finance: FinancialState;
  rngState: RNGState;
  warnings: SimulationWarning[];
}

/**
 * Starting values a caller may override when initializing a run
 */
export interface InitialParams {
  cash?: number;
  materialStock?: number;
  finishedStock?: number;
  storageCapacity?: number;
  workers?: number;
  motivation?: number;
  wage?: number;
  machines?: number;
  wear?: number;
  price?: number;
  advertising?: number;
  awareness?: number;
  materialPrice?: number;
}

// ============================================================================
// Model Configuration
// ============================================================================

export interface WorkforceConfig {
  neutralMotivation: number;
  referenceWage: number;
  wageSensitivity: number; // motivation points per 100% wage above reference
  profitSensitivity: number; // motivation points at a strongly positive profit
  profitScale: number; // profit at which the trend effect reaches ~76%
  adjustmentRate: number; // share of the gap to target closed per period
  shockThreshold: number; // |workerDelta| tolerated without a shock
  shockPenalty: number; // motivation points per worker beyond the threshold
  benefits: number; // paid per worker per period on top of the wage
  benefitSensitivity: number; // motivation points per money unit of benefits
}

export interface MachineConfig {
  maintenancePerMachine: number; // maintenance needed per machine per period
  wearPerUnit: number; // wear points per unit produced per machine
  maintenanceRecovery: number; // wear points removed per money unit per machine
  backlogWear: number; // wear points per backlog money unit per machine
  machinePrice: number;
  resaleFactor: number; // share of price recovered when selling a pristine machine
}

export interface ProductionConfig {
  unitsPerWorker: number;
  unitsPerMachine: number;
  wearPenalty: number; // capacity lost at full wear
  materialPerUnit: number;
}

export interface DemandConfig {
  baseDemand: number;
  awarenessWeight: number; // demand units per awareness point
  peakMultiplier: number;
  elasticityScale: number; // price^2 scale of the demand curve
  awarenessDecay: number; // share of awareness lost per period
  advertisingGain: number; // awareness points from saturating spend
  advertisingScale: number; // spend at which ~63% of the gain is reached
}

export interface FinanceConfig {
  depositRate: number; // per period, on positive cash
  debtRate: number; // per period, on negative cash
  finishedStorageCost: number; // per unit held at the start of the period
  materialStorageCost: number;
  creditScale: number; // deficit at which the credit factor bottoms out
  minCreditFactor: number;
  materialValue: number; // book value per material unit
  finishedValue: number; // book value per finished unit
}

export type ShopLocation = 'suburb' | 'city' | 'innerCity';

/**
 * Sales outlets and the location of the main shop
 */
export interface PremisesConfig {
  outlets: number;
  outletRent: number;
  outletAwareness: number; // awareness points per outlet per period
  location: ShopLocation;
  locationRents: Record<ShopLocation, number>;
  locationFactors: Record<ShopLocation, number>; // multiplier on awareness gains
}

/**
 * `random` draws from the seeded generator; `series` replays fixed
 * per-period values, wrapping around when the run outlasts them.
 */
export type FluctuationMode = 'random' | 'series';

export interface FluctuationConfig {
  enabled: boolean;
  mode: FluctuationMode;
  materialPriceMin: number;
  materialPriceMax: number;
  demandNoise: number;
  materialPriceSeries: number[];
  demandSeries: number[];
}

export interface ShopConfig {
  seed: number;
  maxPeriods: number | null; // run closes itself after this period
  materialPrice: number;
  inputLimits: InputLimitsConfig;
  inputSteps: InputStepsConfig;
  workforce: WorkforceConfig;
  machines: MachineConfig;
  production: ProductionConfig;
  demand: DemandConfig;
  finance: FinanceConfig;
  premises: PremisesConfig;
  fluctuations: FluctuationConfig;
}

/**
 * Recursive partial used for config overrides and presets
 */
export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends readonly unknown[]
    ? T[K]
    : T[K] extends object
      ? DeepPartial<T[K]>
      : T[K];
};
