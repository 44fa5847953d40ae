/**
 * Environment Variable Schema & Validation
 *
 * Registry of every environment variable the context cache reads, with
 * validation and a printable summary for operators.
 */

export interface EnvVarDef {
  /** Environment variable name */
  name: string;
  /** Expected value type */
  type: 'string' | 'number' | 'boolean';
  /** Default value (as string, since env vars are always strings) */
  default?: string;
  description: string;
  required?: boolean;
  /** Masked in summaries */
  sensitive?: boolean;
  category: EnvCategory;
  min?: number;
  max?: number;
  pattern?: RegExp;
}

export type EnvCategory = 'cache' | 'remote' | 'debug';

export const ENV_SCHEMA: EnvVarDef[] = [
  // ---- Cache ----
  {
    name: 'CONTEXT_CACHE_ENABLED',
    type: 'boolean',
    default: 'true',
    description: 'Turn context caching on or off',
    category: 'cache',
  },
  {
    name: 'CONTEXT_CACHE_DEFAULT_TTL',
    type: 'string',
    default: '3600s',
    description: 'Lifetime requested for new cache entries when messages carry none',
    category: 'cache',
    pattern: /^([0-9]*\.?[0-9]+)s$/,
  },
  {
    name: 'CONTEXT_CACHE_SAFETY_BUFFER_SECONDS',
    type: 'number',
    default: '5',
    description: 'Seconds subtracted from every locally tracked TTL',
    category: 'cache',
    min: 0,
    max: 3600,
  },
  {
    name: 'CONTEXT_CACHE_DEDUPLICATE_CREATION',
    type: 'boolean',
    default: 'true',
    description: 'Share one remote lookup/create among concurrent misses for the same key',
    category: 'cache',
  },
  {
    name: 'CONTEXT_CACHE_CLEANUP_INTERVAL_MS',
    type: 'number',
    default: '0',
    description: 'Background pruning interval for expired local entries (0 = off)',
    category: 'cache',
    min: 0,
  },

  // ---- Remote ----
  {
    name: 'CONTEXT_CACHE_REQUEST_TIMEOUT_MS',
    type: 'number',
    default: '30000',
    description: 'Timeout for remote lookup and create calls',
    category: 'remote',
    min: 1,
  },
  {
    name: 'CONTEXT_CACHE_API_BASE',
    type: 'string',
    description: 'Override for the cached-content service host',
    category: 'remote',
    pattern: /^https?:\/\//,
  },
  {
    name: 'GEMINI_API_KEY',
    type: 'string',
    description: 'AI Studio API key used for cached-content calls',
    sensitive: true,
    category: 'remote',
  },

  // ---- Debug ----
  {
    name: 'CONTEXT_CACHE_LOG_LEVEL',
    type: 'string',
    default: 'info',
    description: 'Log level (fatal, error, warn, info, debug, trace, silent)',
    category: 'debug',
    pattern: /^(fatal|error|warn|info|debug|trace|silent)$/,
  },
];

// ---------------------------------------------------------------------------
// Lookup
// ---------------------------------------------------------------------------

const schemaByName: Map<string, EnvVarDef> = new Map(ENV_SCHEMA.map(def => [def.name, def]));

export function getEnvDef(name: string): EnvVarDef | undefined {
  return schemaByName.get(name);
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export interface ValidationResult {
  valid: boolean;
  warnings: string[];
  errors: string[];
}

/**
 * Missing required vars are errors; type and range problems are warnings.
 */
export function validateEnv(env: Record<string, string | undefined> = process.env): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const def of ENV_SCHEMA) {
    const raw = env[def.name];

    if (raw === undefined || raw === '') {
      if (def.required) {
        errors.push(`${def.name} is required but not set. ${def.description}`);
      }
      continue;
    }

    switch (def.type) {
      case 'number': {
        const num = Number(raw);
        if (isNaN(num)) {
          warnings.push(`${def.name} should be a number but got "${raw}"`);
        } else if (def.min !== undefined && num < def.min) {
          warnings.push(`${def.name}=${raw} is below minimum ${def.min}`);
        } else if (def.max !== undefined && num > def.max) {
          warnings.push(`${def.name}=${raw} is above maximum ${def.max}`);
        }
        break;
      }
      case 'boolean': {
        if (!['true', 'false', '1', '0'].includes(raw.toLowerCase())) {
          warnings.push(`${def.name} should be a boolean (true/false) but got "${raw}"`);
        }
        break;
      }
      case 'string': {
        if (def.pattern && !def.pattern.test(raw)) {
          warnings.push(`${def.name}="${raw}" does not match expected pattern ${def.pattern}`);
        }
        break;
      }
    }
  }

  return {
    valid: errors.length === 0,
    warnings,
    errors,
  };
}

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

/**
 * Keep the first and last four characters of long secrets
 */
export function maskValue(value: string): string {
  if (value.length <= 8) {
    return '****';
  }
  return value.slice(0, 4) + '****' + value.slice(-4);
}

const CATEGORY_LABELS: Record<EnvCategory, string> = {
  cache: 'Local Cache',
  remote: 'Remote Cache Service',
  debug: 'Logging',
};

const CATEGORY_ORDER: EnvCategory[] = ['cache', 'remote', 'debug'];

export function getEnvSummary(env: Record<string, string | undefined> = process.env): string {
  const lines: string[] = ['Context Cache Environment', '='.repeat(50)];
  const validation = validateEnv(env);

  for (const category of CATEGORY_ORDER) {
    const defs = ENV_SCHEMA.filter(def => def.category === category);
    if (defs.length === 0) continue;

    lines.push('', `[${CATEGORY_LABELS[category]}]`);

    for (const def of defs) {
      const raw = env[def.name];
      const isSet = raw !== undefined && raw !== '';
      let displayValue: string;

      if (!isSet) {
        displayValue = def.default !== undefined ? `(default: ${def.default})` : '(not set)';
      } else if (def.sensitive) {
        displayValue = maskValue(raw);
      } else {
        displayValue = raw;
      }

      lines.push(`  ${isSet ? '*' : ' '} ${def.name}=${displayValue}${def.required ? ' [required]' : ''}`);
    }
  }

  if (validation.errors.length > 0) {
    lines.push('', 'Errors:', ...validation.errors.map(err => `  ! ${err}`));
  }
  if (validation.warnings.length > 0) {
    lines.push('', 'Warnings:', ...validation.warnings.map(warn => `  ? ${warn}`));
  }

  const setCount = ENV_SCHEMA.filter(def => {
    const value = env[def.name];
    return value !== undefined && value !== '';
  }).length;
  lines.push('', `${setCount}/${ENV_SCHEMA.length} variables set`);

  return lines.join('\n');
}
