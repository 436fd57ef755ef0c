import request from 'supertest';
import { makeTestApp, BEARER_TOKEN, TestApp } from './helpers';
import { ErrorCodes } from '../types';
import { assembleCampaign } from '../../campaign';
import { IContentStore, PublicationError } from '../../publication';
import { verifyMerkleProof } from '../../merkle';
import { makeAddress, makeRecipient } from '../../merkle/tests/fixtures';

const AMOUNT = 2_500n;

describe('GET /eligibility', () => {
  let t: TestApp;
  let cid: string;
  let root: string;

  beforeEach(async () => {
    t = makeTestApp();
    const { tree, document } = assembleCampaign(
      Array.from({ length: 3 }, (_, i) => ({ address: makeAddress(i + 1), amount: AMOUNT }))
    );
    root = tree.root;
    cid = await t.content.pin(document);
  });

  function authed(query: Record<string, string>) {
    return request(t.app)
      .get('/eligibility')
      .query(query)
      .set('Authorization', `Bearer ${BEARER_TOKEN}`);
  }

  it('should require a bearer token', async () => {
    const response = await request(t.app).get('/eligibility').query({ cid, address: makeAddress(1) });

    expect(response.status).toBe(401);
    expect(response.body).toEqual({
      success: false,
      error: 'Bad authentication process provided.',
      code: ErrorCodes.UNAUTHORIZED,
    });
  });

  it('should reject a wrong token', async () => {
    const response = await request(t.app)
      .get('/eligibility')
      .query({ cid, address: makeAddress(1) })
      .set('Authorization', 'Bearer wrong-token');

    expect(response.status).toBe(401);
    expect(response.body.code).toBe(ErrorCodes.UNAUTHORIZED);
  });

  it('should reject a non-bearer scheme', async () => {
    const response = await request(t.app)
      .get('/eligibility')
      .query({ cid, address: makeAddress(1) })
      .set('Authorization', BEARER_TOKEN);

    expect(response.status).toBe(401);
  });

  it('should return the index and a verifying proof', async () => {
    const response = await authed({ cid, address: makeAddress(3) });

    expect(response.status).toBe(200);
    expect(response.body.success).toBe(true);
    expect(response.body.index).toBe(2);
    expect(response.body.address).toBe(makeAddress(3));
    expect(response.body.amount).toBe('2500');
    expect(response.body.proof).toHaveLength(2);
    expect(
      verifyMerkleProof({ index: 2, recipient: makeRecipient(3), amount: AMOUNT }, root, response.body.proof)
    ).toBe(true);
  });

  it('should require cid and address', async () => {
    const noCid = await authed({ address: makeAddress(1) });
    expect(noCid.status).toBe(400);
    expect(noCid.body).toEqual({
      success: false,
      error: 'Missing required parameter: cid',
      code: ErrorCodes.MISSING_PARAMETER,
    });

    const noAddress = await authed({ cid });
    expect(noAddress.status).toBe(400);
    expect(noAddress.body.error).toBe('Missing required parameter: address');
  });

  it('should reject an address outside the campaign', async () => {
    const response = await authed({ cid, address: makeAddress(7) });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      success: false,
      error: 'The provided address is not eligible for this campaign',
      code: ErrorCodes.NOT_ELIGIBLE,
    });
  });

  it('should return 404 for an unknown cid', async () => {
    const response = await authed({ cid: 'f'.repeat(64), address: makeAddress(1) });

    expect(response.status).toBe(404);
    expect(response.body.code).toBe(ErrorCodes.CAMPAIGN_NOT_FOUND);
  });

  it('should return 502 for a malformed document', async () => {
    const badCid = await t.content.pin({ recipients: 'nobody' });
    const response = await authed({ cid: badCid, address: makeAddress(1) });

    expect(response.status).toBe(502);
    expect(response.body.code).toBe(ErrorCodes.INVALID_CAMPAIGN);
  });

  it('should return 502 when the content store fails', async () => {
    const failing: IContentStore = {
      pin: () => Promise.reject(new PublicationError('unused')),
      fetch: () => Promise.reject(new PublicationError('Gateway request failed with status 500', 500)),
    };
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const { app } = makeTestApp({ content: failing });

    const response = await request(app)
      .get('/eligibility')
      .query({ cid, address: makeAddress(1) })
      .set('Authorization', `Bearer ${BEARER_TOKEN}`);

    expect(response.status).toBe(502);
    expect(response.body.code).toBe(ErrorCodes.PUBLICATION_FAILED);
    errorSpy.mockRestore();
  });
});
