/**
 * Tag Guard
 * Provenance and classification checks run before any destructive call.
 * Every check reads the live tag set; nothing is cached between calls.
 */

import { CloudGateway, TaggedResourceRef } from '../types/cloud-gateway';
import { Logger } from '../types/logger';
import {
  ISOLATED_HOSTING_VALUE,
  TAG_CREATED_BY,
  TAG_HOSTING_VPC,
  TOOL_TAG_VALUE,
} from './constants';

export function describeResource(resource: TaggedResourceRef): string {
  return resource.kind === 'cluster' ? `cluster ${resource.name}` : resource.id;
}

export class TagGuard {
  private readonly gateway: CloudGateway;
  private readonly logger: Logger;

  constructor(gateway: CloudGateway, logger: Logger) {
    this.gateway = gateway;
    this.logger = logger;
  }

  /**
   * Value of a tag, or undefined when the resource does not carry it
   */
  async getTagValue(resource: TaggedResourceRef, key: string): Promise<string | undefined> {
    const tags = await this.gateway.getTags(resource);
    return Object.prototype.hasOwnProperty.call(tags, key) ? tags[key] : undefined;
  }

  async hasTag(resource: TaggedResourceRef, key: string, value: string): Promise<boolean> {
    const actual = await this.getTagValue(resource, key);
    const matched = actual === value;
    this.logger.event('guard_checked', `Tag ${key}=${value} ${matched ? 'present' : 'absent'} on ${describeResource(resource)}`, {
      resourceType: resource.kind,
      resourceId: resource.kind === 'cluster' ? resource.name : resource.id,
      tagKey: key,
      matched,
    });
    return matched;
  }

  isCreatedByTool(resource: TaggedResourceRef): Promise<boolean> {
    return this.hasTag(resource, TAG_CREATED_BY, TOOL_TAG_VALUE);
  }

  isIsolatedHosting(resource: TaggedResourceRef): Promise<boolean> {
    return this.hasTag(resource, TAG_HOSTING_VPC, ISOLATED_HOSTING_VALUE);
  }
}
