// Strategy constants
export const PERCENT_SCALE_ADJUST_STRENGTH = 0.002;
export const MIN_FIT_POINTS = 4;
export const FIT_TRACE_POINTS = 50;
export const CROSSING_TRACE_POINTS = 10;

// Optimizer constants
export const DEFAULT_MESH_SIZE = 1.0;
export const SIMULATION_FILE_EXTENSION = '.son';
export const DEFAULT_ARTIFACT_FOLDER_PATTERN = 'batch_{batch}_son_files';
export const DEFAULT_OUTPUT_FOLDER_PATTERN = 'batch_{batch}_outputs';

// Cache constants
export const DEFAULT_CACHE_DIR = '.optimizer-cache';
export const CACHE_FILE_PREFIX = 'OPT_';
export const CACHE_VERSION = 1;

// Resonator quantities the single-resonator analyzer can report
export const RESONATOR_QUANTITIES = ['QR', 'QC', 'QI', 'f0', 'three_dB_BW'] as const;
