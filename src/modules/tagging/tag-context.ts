import { Asset } from '../assets/entities/asset.entity';
import { Component } from '../components/entities/component.entity';
import { Company } from '../organization/entities/company.entity';
import { Department } from '../organization/entities/department.entity';

/** Organisational placement a tag prefix is resolved for. */
export interface TagContext {
  company?: Pick<Company, 'code'> | null;
  department?: Pick<Department, 'name'> | null;
}

/** Company of the asset and department of the employee holding it. */
export function assetTagContext(asset: Asset): TagContext {
  return {
    company: asset.company ?? null,
    department: asset.assignedTo?.department ?? null,
  };
}

/** Placement of the component's parent asset. */
export function componentTagContext(component: Component): TagContext {
  const parent = component.parentAsset;
  return parent ? assetTagContext(parent) : { company: null, department: null };
}
