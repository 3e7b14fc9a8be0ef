import { describe, it, expect } from 'vitest';
import {
  DEVICE_DEPLOYMENT_STATUSES,
  isDeploymentStatus,
  isDeploymentType,
  isDeviceDeploymentStatus,
} from './deployment.js';

describe('status vocabulary', () => {
  it('has thirteen device deployment statuses', () => {
    expect(DEVICE_DEPLOYMENT_STATUSES).toHaveLength(13);
  });

  it('accepts every known device status', () => {
    for (const status of DEVICE_DEPLOYMENT_STATUSES) {
      expect(isDeviceDeploymentStatus(status), status).toBe(true);
    }
  });

  it('rejects values outside the device status set', () => {
    for (const value of ['', 'Success', 'already_installed', 'finished', 42, null, undefined]) {
      expect(isDeviceDeploymentStatus(value), String(value)).toBe(false);
    }
  });

  it('validates deployment statuses', () => {
    expect(['pending', 'inprogress', 'finished'].every(isDeploymentStatus)).toBe(true);
    expect(isDeploymentStatus('in-progress')).toBe(false);
    expect(isDeploymentStatus('aborted')).toBe(false);
  });

  it('validates deployment types', () => {
    expect(isDeploymentType('software')).toBe(true);
    expect(isDeploymentType('configuration')).toBe(true);
    expect(isDeploymentType('')).toBe(false);
    expect(isDeploymentType('firmware')).toBe(false);
  });
});
