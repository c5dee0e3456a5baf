import { callMethod, getPath } from './object-path.util';

describe('getPath', () => {
  const asset = {
    assetTag: 'ENG0001',
    assignedTo: { department: { name: 'Engineering' } },
    location: null,
  };

  it('should read direct properties', () => {
    expect(getPath(asset, 'assetTag')).toBe('ENG0001');
  });

  it('should follow dotted relation paths', () => {
    expect(getPath(asset, 'assignedTo.department.name')).toBe('Engineering');
  });

  it('should stop at null links', () => {
    expect(getPath(asset, 'location.name')).toBeUndefined();
  });

  it('should return undefined for missing segments and primitives', () => {
    expect(getPath(asset, 'vendor.name')).toBeUndefined();
    expect(getPath(asset, 'assetTag.length.value')).toBeUndefined();
    expect(getPath(null, 'id')).toBeUndefined();
  });
});

describe('callMethod', () => {
  it('should call a method with its receiver bound', () => {
    const invoice = {
      status: 'paid',
      getPaymentStatusDisplay(): string {
        return this.status.toUpperCase();
      },
    };

    expect(callMethod(invoice, 'getPaymentStatusDisplay')).toBe('PAID');
  });

  it('should return undefined when the method is absent', () => {
    expect(callMethod({ status: 'paid' }, 'getStatusDisplay')).toBeUndefined();
    expect(callMethod(undefined, 'getStatusDisplay')).toBeUndefined();
  });

  it('should let errors from the method propagate', () => {
    const broken = {
      getStatusDisplay(): string {
        throw new Error('not loaded');
      },
    };

    expect(() => callMethod(broken, 'getStatusDisplay')).toThrow('not loaded');
  });
});
