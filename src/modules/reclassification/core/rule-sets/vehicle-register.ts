/**
 * Motor vehicle register: raw industry, body and motive power codes
 * mapped onto the Category / Sub_Category / Fuel_Type taxonomy.
 */

import { allOf, fieldEquals, fieldIn, numberAbove, numberAtMost } from '../predicates.js';

import type { RuleSet, RuleTable } from '../types.js';

/** Gross vehicle mass (kg) separating light commercial from heavy vehicles */
export const LIGHT_VEHICLE_MASS_LIMIT_KG = 3500;

const COMMERCIAL_INDUSTRY_CLASSES = [
  'BUSINESS/FINANCIAL',
  'COMMERCIAL ROAD TRANSPORT',
  'CONSTRUCTING',
  'WHOLESALE/RETAIL/TRADE',
  'TOURISM/LEISURE',
  'AGRICULTURE/FORESTRY/FISHING',
  'COMMUNITY SERVICES',
  'ELECTRICITY/GAS/WATER',
  'VEHICLE TRADER',
  'MANUFACTURING',
  'MINING/QUARRYING',
  'TRANSPORT NON ROAD',
  'VEHICLE DEALER',
];

const GOODS_VEHICLE_TYPES = ['MOTOR CARAVAN', 'GOODS VAN/TRUCK/UTILITY'];

export const categoryRules: RuleTable = {
  column: 'Category',
  rules: [
    { when: fieldEquals('INDUSTRY_CLASS', 'PRIVATE'), then: 'Private' },
    { when: fieldIn('INDUSTRY_CLASS', COMMERCIAL_INDUSTRY_CLASSES), then: 'Commercial' },
  ],
  fallback: 'Other',
};

export const subCategoryRules: RuleTable = {
  column: 'Sub_Category',
  rules: [
    { when: fieldEquals('VEHICLE_TYPE', 'PASSENGER CAR/VAN'), then: 'Light Passenger Vehicle' },
    { when: fieldEquals('VEHICLE_TYPE', 'BUS'), then: 'Bus' },
    {
      when: allOf(
        fieldIn('VEHICLE_TYPE', GOODS_VEHICLE_TYPES),
        numberAtMost('GROSS_VEHICLE_MASS', LIGHT_VEHICLE_MASS_LIMIT_KG)
      ),
      then: 'Light Commercial Vehicle',
    },
    {
      when: allOf(
        fieldIn('VEHICLE_TYPE', GOODS_VEHICLE_TYPES),
        numberAbove('GROSS_VEHICLE_MASS', LIGHT_VEHICLE_MASS_LIMIT_KG)
      ),
      then: 'Heavy Vehicle',
    },
    { when: fieldEquals('VEHICLE_TYPE', 'ATV'), then: 'ATV' },
    { when: fieldIn('VEHICLE_TYPE', ['MOTORCYCLE', 'MOPED']), then: 'Motorcycle' },
  ],
  fallback: 'Other',
};

export const fuelTypeRules: RuleTable = {
  column: 'Fuel_Type',
  rules: [
    { when: fieldEquals('MOTIVE_POWER', 'PETROL'), then: 'Petrol' },
    { when: fieldEquals('MOTIVE_POWER', 'DIESEL'), then: 'Diesel' },
    { when: fieldIn('MOTIVE_POWER', ['PETROL HYBRID', 'DIESEL HYBRID']), then: 'HEV' },
    {
      when: fieldIn('MOTIVE_POWER', ['PETROL ELECTRIC HYBRID', 'PLUGIN PETROL HYBRID']),
      then: 'PHEV',
    },
    {
      when: fieldIn('MOTIVE_POWER', [
        'ELECTRIC',
        'ELECTRIC [PETROL EXTENDED]',
        'ELECTRIC [DIESEL EXTENDED]',
      ]),
      then: 'BEV',
    },
    {
      when: fieldIn('MOTIVE_POWER', [
        'ELECTRIC FUEL CELL HYDROGEN',
        'ELECTRIC FUEL CELL OTHER',
        'PLUG IN FUEL CELL HYDROGEN HYBRID',
        'PLUG IN FUEL CELL OTHER HYBRID',
      ]),
      then: 'FCEV',
    },
    // Gas-fuelled vehicles are reported with petrol
    { when: fieldIn('MOTIVE_POWER', ['LPG', 'CNG']), then: 'Petrol' },
  ],
  fallback: 'Other',
};

export const conditionRules: RuleTable = {
  column: 'Condition',
  rules: [
    { when: fieldEquals('IMPORT_STATUS', 'NEW'), then: 'NEW' },
    { when: fieldEquals('IMPORT_STATUS', 'USED'), then: 'USED' },
  ],
  fallback: 'Unknown',
};

export const vehicleRegisterRuleSet: RuleSet = {
  id: 'vehicle-register',
  requires: ['INDUSTRY_CLASS', 'VEHICLE_TYPE', 'GROSS_VEHICLE_MASS', 'MOTIVE_POWER', 'IMPORT_STATUS'],
  tables: [categoryRules, subCategoryRules, fuelTypeRules, conditionRules],
};
