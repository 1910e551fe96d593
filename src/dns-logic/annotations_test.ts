import { test } from "node:test";
import { deepEqual, equal, throws } from "node:assert/strict";

import {
  AnnotationParseError,
  composeServiceName, explicitTargets, hostnames,
  preferredNetwork, providerSpecific, swarmServiceId, ttl,
} from "./annotations.ts";

test('hostnames are split, trimmed and made relative-free', () => {
  deepEqual(hostnames({
    'external-dns.alpha.kubernetes.io/hostname': ' a.example.local ,b.example.local.,, ',
  }), ['a.example.local', 'b.example.local']);
  deepEqual(hostnames({}), []);
  deepEqual(hostnames({ 'external-dns.alpha.kubernetes.io/hostname': '' }), []);
});

test('ttl parsing', () => {
  equal(ttl({}), null);
  equal(ttl({ 'external-dns.alpha.kubernetes.io/ttl': '0' }), 0);
  equal(ttl({ 'external-dns.alpha.kubernetes.io/ttl': '1700' }), 1700);
  equal(ttl({ 'external-dns.alpha.kubernetes.io/ttl': ' 300 ' }), 300);

  for (const bad of ['', '-5', '1.5', '10s', 'ten', '2147483648']) {
    throws(() => ttl({ 'external-dns.alpha.kubernetes.io/ttl': bad }), AnnotationParseError);
  }
});

test('ttl errors name the offending label', () => {
  throws(() => ttl({ 'external-dns.alpha.kubernetes.io/ttl': 'soon' }), {
    name: 'AnnotationParseError',
    key: 'external-dns.alpha.kubernetes.io/ttl',
    value: 'soon',
    message: 'Label external-dns.alpha.kubernetes.io/ttl="soon" is not a non-negative integer',
  });
});

test('explicit targets', () => {
  deepEqual(explicitTargets({
    'external-dns.alpha.kubernetes.io/target': '192.0.2.1, 192.0.2.2',
  }), ['192.0.2.1', '192.0.2.2']);
  deepEqual(explicitTargets({}), []);
});

test('provider specific options are collected in key order', () => {
  deepEqual(providerSpecific({
    'external-dns.alpha.kubernetes.io/hostname': 'a.example.local',
    'external-dns.alpha.kubernetes.io/cloudflare-proxied': 'false',
    'external-dns.alpha.kubernetes.io/aws-weight': '10',
    'external-dns.alpha.kubernetes.io/alias': 'true',
    'external-dns.alpha.kubernetes.io/scw-priority': '5',
    'external-dns.alpha.kubernetes.io/set-identifier': 'blue',
  }), {
    options: {
      'alias': 'true',
      'aws/weight': '10',
      'external-dns.alpha.kubernetes.io/cloudflare-proxied': 'false',
      'scw/priority': '5',
    },
    setIdentifier: 'blue',
  });

  deepEqual(providerSpecific({
    'external-dns.alpha.kubernetes.io/alias': 'false',
  }), { options: {}, setIdentifier: null });
});

test('network preference', () => {
  deepEqual(preferredNetwork({ 'external-dns/network': 'backend' }), { name: 'backend', present: true });
  deepEqual(preferredNetwork({}), { name: '', present: false });
});

test('grouping labels ignore empty values', () => {
  equal(composeServiceName({ 'com.docker.compose.service': 'web' }), 'web');
  equal(composeServiceName({ 'com.docker.compose.service': '' }), null);
  equal(swarmServiceId({ 'com.docker.swarm.service.id': 'svc-1' }), 'svc-1');
  equal(swarmServiceId({ 'com.docker.swarm.service.id': '' }), null);
  equal(swarmServiceId({}), null);
});
