/**
 * Fixed AWS values and pipeline defaults
 */

/** ACM certificates used by CloudFront must live in us-east-1; the CloudFront API is served from there too */
export const GLOBAL_SERVICES_REGION = 'us-east-1';

/** Hosted zone id every CloudFront alias target uses */
export const CLOUDFRONT_HOSTED_ZONE_ID = 'Z2FDTNDATAQYW2';

/** AWS managed cache policy "CachingOptimized" */
export const CACHING_OPTIMIZED_POLICY_ID = '658327ea-f89d-4fab-a63d-7e88639e58f6';

export const DEFAULT_REGION = 'us-east-1';

export const DEFAULT_CERTIFICATE_TIMEOUT_MINUTES = 30;
export const DEFAULT_DISTRIBUTION_TIMEOUT_MINUTES = 30;

/** ACM usually issues within minutes of the CNAMEs resolving */
export const DEFAULT_CERTIFICATE_POLL_SECONDS = 20;
/** CloudFront propagation takes 10-20 minutes */
export const DEFAULT_DISTRIBUTION_POLL_SECONDS = 45;

export const VALIDATION_RECORD_TTL = 300;
export const WEBSITE_RECORD_TTL = 300;

/** Build output folders, framework static export first */
export const OUTPUT_DIRECTORIES = ['out', 'dist', 'build'] as const;
