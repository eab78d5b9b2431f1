/**
 * Shop State Management
 * Default configuration, presets, initialization and state helpers
 */

import type {
  ShopState,
  ShopConfig,
  InitialParams,
  ControllableInputs,
  DeepPartial,
  CostBreakdown,
} from './types.js';
import { SeededRNG } from './rng.js';
import { clamp } from './math.js';
import { InvalidInputError } from './errors.js';
import {
  calculateCapacity,
  calculateLabourCapacity,
  calculateMachineCapacity,
} from '../systems/production.js';
import { calculateDemand } from '../systems/demand.js';
import { calculateCompanyValue, calculateCreditFactor } from '../systems/finance.js';

/**
 * Default model configuration
 *
 * Functional forms follow the classic tailor shop task (Gaussian price
 * response, square-root motivation effect on output, 80% machine resale).
 * Storage costs and interest are off so that a month with no spending
 * changes cash by exactly the wage bill; see ORIGINAL_ECONOMY.
 */
export const DEFAULT_CONFIG: ShopConfig = {
  seed: 12345,
  maxPeriods: null,
  materialPrice: 4,
  inputLimits: {
    maxPrice: 200,
    maxMaterialPurchase: 5000,
    maxAdvertising: 10000,
    maxWage: 5000,
    maxHiresPerPeriod: 20,
    maxMachinePurchasesPerPeriod: 10,
    maxMaintenance: 5000,
  },
  inputSteps: {
    enabled: false,
    steps: {
      price: 2,
      materialPurchase: 50,
      advertising: 100,
      wage: 100,
      workerDelta: 1,
      machineDelta: 1,
      maintenance: 100,
    },
  },
  workforce: {
    neutralMotivation: 50,
    referenceWage: 1000,
    wageSensitivity: 40,
    profitSensitivity: 10,
    profitScale: 10000,
    adjustmentRate: 0.5,
    shockThreshold: 3,
    shockPenalty: 5,
    benefits: 0,
    benefitSensitivity: 0.0275,
  },
  machines: {
    maintenancePerMachine: 100,
    wearPerUnit: 0.05,
    maintenanceRecovery: 0.02,
    backlogWear: 0.01,
    machinePrice: 10000,
    resaleFactor: 0.8,
  },
  production: {
    unitsPerWorker: 50,
    unitsPerMachine: 50,
    wearPenalty: 0.5,
    materialPerUnit: 1,
  },
  demand: {
    baseDemand: 280,
    awarenessWeight: 4,
    peakMultiplier: 1.25,
    elasticityScale: 4250,
    awarenessDecay: 0.1,
    advertisingGain: 10,
    advertisingScale: 3000,
  },
  finance: {
    depositRate: 0,
    debtRate: 0,
    finishedStorageCost: 0,
    materialStorageCost: 0,
    creditScale: 50000,
    minCreditFactor: 0.2,
    materialValue: 2,
    finishedValue: 20,
  },
  premises: {
    outlets: 0,
    outletRent: 0,
    outletAwareness: 2,
    location: 'suburb',
    locationRents: { suburb: 0, city: 0, innerCity: 0 },
    locationFactors: { suburb: 1, city: 1.1, innerCity: 1.2 },
  },
  fluctuations: {
    enabled: false,
    mode: 'random',
    materialPriceMin: 2,
    materialPriceMax: 8.5,
    demandNoise: 50,
    materialPriceSeries: [],
    demandSeries: [],
  },
};

/**
 * Fixed 14-month market of the classic task
 */
export const CLASSIC_MATERIAL_PRICES: readonly number[] = [
  8.2671817, 4.8714296, 4.8530515, 5.9098319, 5.18731075, 7.09909075, 6.772157,
  7.6171843, 8.02385095, 2.6811532, 5.0227145, 6.29710125, 7.7631327, 2.51019404,
];

export const CLASSIC_DEMAND_SWINGS: readonly number[] = [
  -23.04985, 19.2422, 34.44874, 19.7927, -24.671, 30.50709, -4.26652,
  38.93418, -12.88273, -47.064686, -13.75205, -49.315691, 25.20559, 30.6675,
];

/**
 * Preset with the bank interest, storage charges, worker benefits, one
 * outlet in the city, fixed market series and 14-month horizon of the
 * classic task
 */
export const ORIGINAL_ECONOMY: DeepPartial<ShopConfig> = {
  maxPeriods: 14,
  workforce: {
    benefits: 50,
  },
  finance: {
    depositRate: 0.0025,
    debtRate: 0.0066,
    finishedStorageCost: 1,
    materialStorageCost: 0.5,
  },
  premises: {
    outlets: 1,
    outletRent: 500,
    location: 'city',
    locationRents: { suburb: 500, city: 1000, innerCity: 2000 },
  },
  fluctuations: {
    enabled: true,
    mode: 'series',
    materialPriceSeries: [...CLASSIC_MATERIAL_PRICES],
    demandSeries: [...CLASSIC_DEMAND_SWINGS],
  },
};

/**
 * Documented starting values for period 0
 */
export const DEFAULT_INITIAL_PARAMS: Required<InitialParams> = {
  cash: 165775,
  materialStock: 16,
  finishedStock: 81,
  storageCapacity: 2000,
  workers: 8,
  motivation: 50,
  wage: 1000,
  machines: 10,
  wear: 6,
  price: 52,
  advertising: 2800,
  awareness: 50,
  materialPrice: 4,
};

/**
 * Decisions that keep the business as it is (no hires, no purchases)
 */
export const DEFAULT_INPUTS: ControllableInputs = {
  price: 52,
  materialPurchase: 0,
  advertising: 2800,
  wage: 1000,
  workerDelta: 0,
  machineDelta: 0,
  maintenance: 1000,
};

/**
 * Merge a partial config over a base config section by section
 */
export function mergeConfig(
  base: ShopConfig,
  overrides: DeepPartial<ShopConfig> = {}
): ShopConfig {
  return {
    seed: overrides.seed ?? base.seed,
    maxPeriods: overrides.maxPeriods === undefined ? base.maxPeriods : overrides.maxPeriods,
    materialPrice: overrides.materialPrice ?? base.materialPrice,
    inputLimits: { ...base.inputLimits, ...overrides.inputLimits },
    inputSteps: {
      enabled: overrides.inputSteps?.enabled ?? base.inputSteps.enabled,
      steps: { ...base.inputSteps.steps, ...overrides.inputSteps?.steps },
    },
    workforce: { ...base.workforce, ...overrides.workforce },
    machines: { ...base.machines, ...overrides.machines },
    production: { ...base.production, ...overrides.production },
    demand: { ...base.demand, ...overrides.demand },
    finance: { ...base.finance, ...overrides.finance },
    premises: {
      ...base.premises,
      ...overrides.premises,
      locationRents: { ...base.premises.locationRents, ...overrides.premises?.locationRents },
      locationFactors: { ...base.premises.locationFactors, ...overrides.premises?.locationFactors },
    },
    fluctuations: { ...base.fluctuations, ...overrides.fluctuations },
  };
}

export function emptyCosts(): CostBreakdown {
  return {
    material: 0,
    wages: 0,
    advertising: 0,
    maintenance: 0,
    machines: 0,
    storage: 0,
    interest: 0,
    benefits: 0,
    rent: 0,
  };
}

const INITIAL_PARAM_KEYS: readonly (keyof InitialParams)[] = [
  'cash',
  'materialStock',
  'finishedStock',
  'storageCapacity',
  'workers',
  'motivation',
  'wage',
  'machines',
  'wear',
  'price',
  'advertising',
  'awareness',
  'materialPrice',
];

/**
 * Fill in defaults and bring every starting value into its valid range
 * Non-finite values are rejected rather than clamped.
 */
export function normalizeInitialParams(
  params: InitialParams,
  config: ShopConfig
): Required<InitialParams> {
  const p: Required<InitialParams> = {
    ...DEFAULT_INITIAL_PARAMS,
    materialPrice: config.materialPrice,
  };

  for (const key of INITIAL_PARAM_KEYS) {
    const value: unknown = params[key];
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new InvalidInputError(`Initial value "${key}" must be a finite number, got ${String(value)}`);
    }
    p[key] = value;
  }

  const storageCapacity = Math.max(0, p.storageCapacity);
  return {
    cash: p.cash,
    materialStock: Math.max(0, p.materialStock),
    finishedStock: clamp(p.finishedStock, 0, storageCapacity),
    storageCapacity,
    workers: Math.max(0, Math.round(p.workers)),
    motivation: clamp(p.motivation, 0, 100),
    wage: Math.max(0, p.wage),
    machines: Math.max(0, Math.round(p.machines)),
    wear: clamp(p.wear, 0, 100),
    price: Math.max(0, p.price),
    advertising: Math.max(0, p.advertising),
    awareness: clamp(p.awareness, 0, 100),
    materialPrice: Math.max(0, p.materialPrice),
  };
}

/**
 * Create the period-0 state
 */
export function initializeShop(
  params: InitialParams = {},
  config: ShopConfig = DEFAULT_CONFIG
): ShopState {
  const p = normalizeInitialParams(params, config);

  const labourCapacity = calculateLabourCapacity(p.workers, p.motivation, config);
  const machineCapacity = calculateMachineCapacity(p.machines, p.wear, config);

  return {
    period: 0,
    inventory: {
      materialStock: p.materialStock,
      finishedStock: p.finishedStock,
      storageCapacity: p.storageCapacity,
    },
    workforce: {
      workers: p.workers,
      motivation: p.motivation,
      wage: p.wage,
    },
    machines: {
      machines: p.machines,
      wear: p.wear,
      maintenanceBacklog: 0,
    },
    production: {
      labourCapacity,
      machineCapacity,
      capacity: calculateCapacity(labourCapacity, machineCapacity),
      materialLimit: Math.floor(p.materialStock / config.production.materialPerUnit),
      unitsProduced: 0,
      idleRatio: 0,
    },
    commercial: {
      price: p.price,
      advertising: p.advertising,
      awareness: p.awareness,
      demand: calculateDemand(p.price, p.awareness, 0, config),
      stockAvailable: p.finishedStock,
      unitsSold: 0,
      lostSales: 0,
      materialPrice: p.materialPrice,
    },
    finance: {
      cash: p.cash,
      revenue: 0,
      cost: 0,
      costs: emptyCosts(),
      profit: 0,
      cumulativeProfit: 0,
      creditFactor: calculateCreditFactor(p.cash, config),
      companyValue: calculateCompanyValue(
        p.cash,
        p.machines,
        p.wear,
        p.materialStock,
        p.finishedStock,
        config
      ),
    },
    rngState: SeededRNG.stateFromSeed(config.seed),
    warnings: [],
  };
}

/**
 * Deep copy of a state (snapshots in history are frozen)
 */
export function cloneShopState(state: ShopState): ShopState {
  return {
    period: state.period,
    inventory: { ...state.inventory },
    workforce: { ...state.workforce },
    machines: { ...state.machines },
    production: { ...state.production },
    commercial: { ...state.commercial },
    finance: { ...state.finance, costs: { ...state.finance.costs } },
    rngState: { ...state.rngState },
    warnings: state.warnings.map((w) => ({ ...w })),
  };
}

/**
 * Recursively freeze a snapshot so history cannot be mutated
 */
export function freezeState<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      freezeState(child);
    }
  }
  return value;
}
