import type { AttributeValue, VerificationResult } from '@batchguard/types';

import type { AttributeVerifierKind, ValueVerifierKind } from '../definitions/kinds.js';
import { verifyManagerAcl } from './acl.js';
import type { VerificationContext } from './context.js';
import {
  verifyArrayRange,
  verifyAuthorizedUsers,
  verifyDependList,
  verifyJobName,
  verifyMailUsers,
  verifyPath,
  verifyQueueName,
  verifyShellPathList,
  verifyStageList,
  verifyUserList,
} from './lists.js';
import { verifyPreemptTargets } from './preempt-targets.js';
import { verifyResource } from './resource.js';
import {
  verifyCheckpoint,
  verifyCredentialName,
  verifyHold,
  verifyJoinPath,
  verifyKeepFiles,
  verifyLicenseLinger,
  verifyMailPoints,
  verifyMaxLicenses,
  verifyMinLicenses,
  verifyNonZeroPositive,
  verifyPriority,
  verifyQueueType,
  verifySandbox,
  verifyState,
  verifyZeroOrPositive,
} from './scalar.js';
import { verifySelect } from './select.js';

export function runValueVerifier(
  context: VerificationContext,
  kind: ValueVerifierKind,
  attribute: AttributeValue
): VerificationResult {
  switch (kind) {
    case 'resource':
      return verifyResource(context, attribute);
    case 'userList':
      return verifyUserList(context, attribute);
    case 'authorizedUsers':
      return verifyAuthorizedUsers(context, attribute);
    case 'dependList':
      return verifyDependList(context, attribute);
    case 'path':
      return verifyPath(context, attribute);
    case 'arrayRange':
      return verifyArrayRange(context, attribute);
    case 'jobName':
      return verifyJobName(context, attribute);
    case 'checkpoint':
      return verifyCheckpoint(context, attribute);
    case 'hold':
      return verifyHold(context, attribute);
    case 'joinPath':
      return verifyJoinPath(context, attribute);
    case 'keepFiles':
      return verifyKeepFiles(context, attribute);
    case 'mailPoints':
      return verifyMailPoints(context, attribute);
    case 'mailUsers':
      return verifyMailUsers(context, attribute);
    case 'shellPathList':
      return verifyShellPathList(context, attribute);
    case 'priority':
      return verifyPriority(context, attribute);
    case 'sandbox':
      return verifySandbox(context, attribute);
    case 'stageList':
      return verifyStageList(context, attribute);
    case 'credentialName':
      return verifyCredentialName(context, attribute);
    case 'zeroOrPositive':
      return verifyZeroOrPositive(context, attribute);
    case 'nonZeroPositive':
      return verifyNonZeroPositive(context, attribute);
    case 'minLicenses':
      return verifyMinLicenses(context, attribute);
    case 'maxLicenses':
      return verifyMaxLicenses(context, attribute);
    case 'licenseLinger':
      return verifyLicenseLinger(context, attribute);
    case 'queueType':
      return verifyQueueType(context, attribute);
    case 'state':
      return verifyState(context, attribute);
    case 'queueName':
      return verifyQueueName(context, attribute);
    case 'select':
      return verifySelect(context, attribute);
    case 'preemptTargets':
      return verifyPreemptTargets(context, attribute);
  }
}

export async function runAttributeVerifier(
  context: VerificationContext,
  kind: AttributeVerifierKind,
  attribute: AttributeValue
): Promise<VerificationResult> {
  if (kind === 'managerAcl') {
    return verifyManagerAcl(context, attribute);
  }

  return runValueVerifier(context, kind, attribute);
}
