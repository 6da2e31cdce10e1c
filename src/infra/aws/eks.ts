/**
 * EKS cluster discovery
 */

import { EKSClient, paginateListClusters } from '@aws-sdk/client-eks';
import { fromIni } from '@aws-sdk/credential-providers';
import { Failure, Success, type ClusterLister } from '@/types';
import { extractErrorMessage } from '@/lib/errors';
import { extractAwsErrorGuidance } from './errors';

export function createEksClusterLister(): ClusterLister {
  return {
    async listClusters(profile, region) {
      const client = new EKSClient({ region, credentials: fromIni({ profile }) });
      const clusters: string[] = [];
      try {
        for await (const page of paginateListClusters({ client }, {})) {
          clusters.push(...(page.clusters ?? []));
        }
        return Success(clusters);
      } catch (error) {
        return Failure(
          `Failed to list clusters for profile '${profile}' in region '${region}': ${extractErrorMessage(error)}`,
          extractAwsErrorGuidance(error),
        );
      } finally {
        client.destroy();
      }
    },
  };
}
