/**
 * address-resolution.test.ts - Unit tests for private IP resolution
 *
 * The two lookups are stubbed by answering on the oci subcommand, so each
 * test can fail exactly one step.
 */

import { describe, it, expect, vi } from "vitest";
import {
  resolvePrivateAddress,
  parseVnicId,
  parsePrivateIp,
  describeResolution,
} from "./address-resolution";
import type { OciResult } from "../utils/oci";
import type { OciContext } from "./types";

const CONTEXT: OciContext = {
  compartmentId: "ocid1.compartment.oc1..test",
  region: "ap-singapore-2",
  authMethod: "instance_principal",
  timeoutMs: 5000,
};

const ok = (output: string): OciResult => ({ output, isError: false });
const failed = (output: string): OciResult => ({ output, isError: true });

/**
 * Builds an executor that answers the attachment and VNIC lookups.
 */
function stubOci(attachment: OciResult, vnic: OciResult) {
  return vi.fn((args: string[], _timeoutMs?: number): OciResult => {
    if (args[1] === "vnic-attachment") return attachment;
    if (args[1] === "vnic") return vnic;
    return failed(`unexpected command: ${args.join(" ")}`);
  });
}

const ATTACHMENT = ok(
  JSON.stringify({ data: [{ "vnic-id": "ocid1.vnic.oc1..primary" }] })
);
const VNIC = ok(JSON.stringify({ data: { "private-ip": "10.0.1.15" } }));

describe("resolvePrivateAddress", () => {
  it("returns the private IP when both lookups succeed", async () => {
    const oci = stubOci(ATTACHMENT, VNIC);

    const result = await resolvePrivateAddress("ocid1.instance.oc1..web", CONTEXT, { oci });

    expect(result).toEqual({ kind: "resolved", address: "10.0.1.15" });
  });

  it("looks up the attachment by instance, then the VNIC by id", async () => {
    const oci = stubOci(ATTACHMENT, VNIC);

    await resolvePrivateAddress("ocid1.instance.oc1..web", CONTEXT, { oci });

    expect(oci).toHaveBeenCalledTimes(2);
    expect(oci.mock.calls[0]).toEqual([
      [
        "compute",
        "vnic-attachment",
        "list",
        "--compartment-id",
        "ocid1.compartment.oc1..test",
        "--instance-id",
        "ocid1.instance.oc1..web",
        "--region",
        "ap-singapore-2",
        "--auth",
        "instance_principal",
      ],
      5000,
    ]);
    expect(oci.mock.calls[1]).toEqual([
      [
        "network",
        "vnic",
        "get",
        "--vnic-id",
        "ocid1.vnic.oc1..primary",
        "--region",
        "ap-singapore-2",
        "--auth",
        "instance_principal",
      ],
      5000,
    ]);
  });

  it("returns no-attachment without a VNIC lookup when the attachment call fails", async () => {
    const oci = stubOci(failed("ServiceError: 404"), VNIC);

    const result = await resolvePrivateAddress("ocid1.instance.oc1..web", CONTEXT, { oci });

    expect(result).toEqual({ kind: "no-attachment" });
    expect(oci).toHaveBeenCalledOnce();
  });

  it("returns no-attachment when the instance has no attachments", async () => {
    const oci = stubOci(ok(""), VNIC);

    const result = await resolvePrivateAddress("ocid1.instance.oc1..web", CONTEXT, { oci });

    expect(result).toEqual({ kind: "no-attachment" });
    expect(oci).toHaveBeenCalledOnce();
  });

  it("returns no-attachment for an empty attachment list", async () => {
    const oci = stubOci(ok('{"data": []}'), VNIC);

    const result = await resolvePrivateAddress("ocid1.instance.oc1..web", CONTEXT, { oci });

    expect(result).toEqual({ kind: "no-attachment" });
  });

  it("returns no-address when the VNIC call fails (including timeouts)", async () => {
    const oci = stubOci(ATTACHMENT, failed("spawnSync oci ETIMEDOUT"));

    const result = await resolvePrivateAddress("ocid1.instance.oc1..web", CONTEXT, { oci });

    expect(result).toEqual({ kind: "no-address" });
  });

  it("returns no-address when the VNIC has no private IP", async () => {
    const oci = stubOci(ATTACHMENT, ok('{"data": {"private-ip": null}}'));

    const result = await resolvePrivateAddress("ocid1.instance.oc1..web", CONTEXT, { oci });

    expect(result).toEqual({ kind: "no-address" });
  });

  it("returns no-address when the VNIC output is not JSON", async () => {
    const oci = stubOci(ATTACHMENT, ok("<html>"));

    const result = await resolvePrivateAddress("ocid1.instance.oc1..web", CONTEXT, { oci });

    expect(result).toEqual({ kind: "no-address" });
  });
});

describe("parseVnicId", () => {
  it("takes the first attachment's VNIC id", () => {
    const json = JSON.stringify({
      data: [{ "vnic-id": "ocid1.vnic.oc1..first" }, { "vnic-id": "ocid1.vnic.oc1..second" }],
    });
    expect(parseVnicId(json)).toBe("ocid1.vnic.oc1..first");
  });

  it("returns undefined for a null VNIC id", () => {
    expect(parseVnicId('{"data": [{"vnic-id": null}]}')).toBeUndefined();
  });
});

describe("parsePrivateIp", () => {
  it("returns undefined for an empty string address", () => {
    expect(parsePrivateIp('{"data": {"private-ip": ""}}')).toBeUndefined();
  });
});

describe("describeResolution", () => {
  it("renders each outcome", () => {
    expect(describeResolution({ kind: "resolved", address: "10.0.0.1" })).toBe("10.0.0.1");
    expect(describeResolution({ kind: "no-attachment" })).toBe("NO_VNIC");
    expect(describeResolution({ kind: "no-address" })).toBe("NO_IP");
  });
});
