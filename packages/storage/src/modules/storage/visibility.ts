import type { Grant, ObjectCannedACL } from "@aws-sdk/client-s3";
import type { Visibility, VisibilityInput } from "@bucketfs/shared";

const ALL_USERS_GROUP = "http://acs.amazonaws.com/groups/global/AllUsers";

export type ObjectAcl = "private" | "public-read" | "public-read-write";

export function aclFromGrants(grants: Grant[] = []): ObjectAcl {
  const permissions = new Set(
    grants
      .filter((grant) => grant.Grantee?.Type === "Group" && grant.Grantee.URI === ALL_USERS_GROUP)
      .map((grant) => grant.Permission)
  );

  if (permissions.has("FULL_CONTROL") || (permissions.has("READ") && permissions.has("WRITE"))) {
    return "public-read-write";
  }
  if (permissions.has("READ")) return "public-read";
  return "private";
}

export function visibilityFromAcl(acl: ObjectAcl): Visibility {
  return acl === "public-read-write" ? "public" : acl;
}

export function aclFromVisibility(visibility: VisibilityInput): ObjectCannedACL {
  return visibility === "public" ? "public-read-write" : visibility;
}
