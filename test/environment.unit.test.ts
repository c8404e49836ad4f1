// Unit tests for configuration checks and item keys
import { describe, it, expect } from 'vitest';
import { assertCampaignConfig, assertPipelineConfig, config, readRegions, requireSetting } from '../src/shared/utils/environment';
import { ConfigurationError } from '../src/shared/utils/error-handling';
import { albumPartitionKey, formatNPage, parseNPage, userPartitionKey } from '../src/shared/utils/item-keys';

describe('Environment Unit Tests', () => {
  it('should trim required settings and reject blank ones', () => {
    expect(requireSetting('SITE_BASE_URL', ' https://patterns.example.com ')).toBe('https://patterns.example.com');
    expect(() => requireSetting('SENDER_EMAIL', ' ')).toThrow('SENDER_EMAIL is not configured');
    expect(() => requireSetting('SENDER_EMAIL', undefined)).toThrow(ConfigurationError);
  });

  it('should accept the test configuration', () => {
    expect(() => assertPipelineConfig()).not.toThrow();
    expect(() => assertCampaignConfig()).not.toThrow();
  });

  it('should name the first missing pipeline setting', () => {
    expect(() => assertPipelineConfig({ ...config, environmentName: '' })).toThrow('EC2_ENVIRONMENT_NAME is not configured');
    expect(() => assertPipelineConfig({ ...config, pdfVariants: [] })).toThrow('PDF_VARIANTS must name at least one variant');
    expect(() => assertCampaignConfig({ ...config, senderEmail: '' })).toThrow('SENDER_EMAIL is not configured');
  });

  it('should default the SES and EC2 regions to the data region', () => {
    expect(readRegions({})).toEqual({ primary: 'us-east-1', ses: 'us-east-1', ec2: 'us-east-1' });
    expect(readRegions({ AWS_REGION: 'eu-west-1', SES_REGION: 'us-east-1' })).toEqual({
      primary: 'eu-west-1',
      ses: 'us-east-1',
      ec2: 'eu-west-1'
    });
  });

  it('should build album keys and padded pages', () => {
    expect(albumPartitionKey(7)).toBe('ALB#0007');
    expect(userPartitionKey('ann@example.com')).toBe('USR#ann@example.com');
    expect(formatNPage(42)).toBe('00042');
    expect(parseNPage('00042')).toBe(42);
    expect(parseNPage('00000')).toBe(0);
    expect(parseNPage('4x')).toBeNull();
  });
});
