import 'dotenv/config';

function env(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function envInt(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be an integer, got: ${value}`);
  }
  return parsed;
}

function envFloat(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return parsed;
}

function envBool(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function envList(key: string, defaultValue: string[]): string[] {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

export type AIProvider = 'claude' | 'gemini';

function envProvider(): AIProvider {
  const value = env('AI_PROVIDER', 'claude').toLowerCase();
  if (value !== 'claude' && value !== 'gemini') {
    throw new Error(`AI_PROVIDER must be "claude" or "gemini", got: ${value}`);
  }
  return value;
}

export const config = {
  database: {
    url: env('DATABASE_URL', './data/thread-monitor.db'),
  },

  apiKeys: {
    anthropic: env('ANTHROPIC_API_KEY', ''),
    googleAi: env('GOOGLE_AI_API_KEY', ''),
  },

  server: {
    port: envInt('PORT', 3007),
    host: env('HOST', '0.0.0.0'),
    nodeEnv: env('NODE_ENV', 'development'),
  },

  ai: {
    provider: envProvider(),
    claude: {
      model: env('CLAUDE_MODEL', 'claude-3-5-sonnet-latest'),
      maxTokens: envInt('CLAUDE_MAX_TOKENS', 1000),
    },
    gemini: {
      model: env('GEMINI_MODEL', 'gemini-2.5-flash'),
    },
    analyzerMaxContentChars: envInt('ANALYZER_MAX_CONTENT_CHARS', 6000),
  },

  reddit: {
    baseUrl: env('REDDIT_BASE_URL', 'https://www.reddit.com'),
    userAgent: env('REDDIT_USER_AGENT', 'thread-relevance-monitor/0.1'),
    maxRequestsPerWindow: envInt('REDDIT_MAX_REQUESTS', 60),
    windowMs: envInt('REDDIT_WINDOW_MS', 60_000),
    postsPerSubreddit: envInt('POSTS_PER_SUBREDDIT', 50),
    commentsPerPost: envInt('COMMENTS_PER_POST', 100),
  },

  sources: {
    primary: envList('PRIMARY_SUBREDDITS', [
      'teachers', 'specialed', 'autism', 'ADHD', 'speechtherapy',
      'occupationaltherapy', 'homeschool', 'Parenting', 'toddlers', 'preschool',
    ]),
    secondary: envList('SECONDARY_SUBREDDITS', [
      'education', 'ABA', 'ASD', 'learningdisabilities', 'Montessori',
      'waldorf', 'ECEProfessionals', 'socialwork', 'childdevelopment',
    ]),
    tertiary: envList('TERTIARY_SUBREDDITS', [
      'kindergarten', 'elementary', 'SLP', 'AskParents', 'daddit', 'Mommit',
    ]),
  },

  scoring: {
    negativeSentimentThreshold: envFloat('SCORING_NEGATIVE_SENTIMENT_THRESHOLD', -0.5),
    negativeSentimentMultiplier: envFloat('SCORING_NEGATIVE_SENTIMENT_MULTIPLIER', 1.2),
    ageRelevanceMultiplier: envFloat('SCORING_AGE_MULTIPLIER', 1.1),
    highUrgencyMultiplier: envFloat('SCORING_HIGH_URGENCY_MULTIPLIER', 1.3),
    mediumUrgencyMultiplier: envFloat('SCORING_MEDIUM_URGENCY_MULTIPLIER', 1.1),
  },

  tiers: {
    highMin: envFloat('TIER_HIGH_MIN', 8),
    mediumMin: envFloat('TIER_MEDIUM_MIN', 6),
    lowMin: envFloat('TIER_LOW_MIN', 4),
  },

  monitor: {
    intervalMs: envInt('MONITOR_INTERVAL_MS', 300_000),
    responseMinScore: envFloat('RESPONSE_MIN_SCORE', 6),
    persistDedup: envBool('DEDUP_PERSIST', true),
  },

  drafting: {
    productName: env('PRODUCT_NAME', 'Sproutly'),
    variations: envInt('DRAFT_VARIATIONS', 3),
  },

  digest: {
    cron: env('DIGEST_CRON', '0 8 * * *'),
    windowHours: envInt('DIGEST_WINDOW_HOURS', 24),
    from: env('DIGEST_FROM', ''),
    to: env('DIGEST_TO', ''),
  },

  smtp: {
    host: env('SMTP_HOST', ''),
    port: envInt('SMTP_PORT', 587),
    secure: envBool('SMTP_SECURE', false),
    user: env('SMTP_USER', ''),
    password: env('SMTP_PASSWORD', ''),
  },
} as const;

export type AppConfig = typeof config;

export function validateConfig(): void {
  const warnings: string[] = [];
  const errors: string[] = [];

  if (config.ai.provider === 'claude' && !config.apiKeys.anthropic) {
    warnings.push('ANTHROPIC_API_KEY is not set; every thread will use the keyword scorer');
  }
  if (config.ai.provider === 'gemini' && !config.apiKeys.googleAi) {
    warnings.push('GOOGLE_AI_API_KEY is not set; every thread will use the keyword scorer');
  }
  if (!config.smtp.host || !config.digest.to) {
    warnings.push('SMTP_HOST / DIGEST_TO are not set, digest delivery will fail');
  }

  const { highMin, mediumMin, lowMin } = config.tiers;
  if (!(highMin > mediumMin && mediumMin > lowMin)) {
    errors.push(`Tier thresholds must be strictly descending, got high=${highMin} medium=${mediumMin} low=${lowMin}`);
  }
  if (config.sources.primary.length === 0) {
    errors.push('PRIMARY_SUBREDDITS must name at least one subreddit');
  }

  if (config.server.nodeEnv === 'production') {
    if (!config.smtp.host || !config.smtp.user) {
      errors.push('SMTP_HOST and SMTP_USER are required in production');
    }
    if (!config.digest.from || !config.digest.to) {
      errors.push('DIGEST_FROM and DIGEST_TO are required in production');
    }
  }

  for (const warning of warnings) {
    console.warn(`[config] WARNING: ${warning}`);
  }

  if (errors.length > 0) {
    throw new Error(`Configuration errors:\n${errors.map((e) => `  - ${e}`).join('\n')}`);
  }
}
