import { zValidator } from '@hono/zod-validator';
import {
  CreateBeneficiarySchema,
  UpdateBeneficiarySchema,
  UuidParamSchema,
} from '@payflow/types';
import { Hono } from 'hono';
import { throwOnInvalid } from '../lib/errors.js';
import { success } from '../lib/responses.js';
import { authMiddleware } from '../middleware/auth.js';
import { requireCapability } from '../middleware/capabilities.js';
import type { AppBindings } from '../types/context.js';

const beneficiariesRoute = new Hono<AppBindings>();

// Ownership of individual records is checked by BeneficiaryService (403 otherwise)
beneficiariesRoute.use('*', authMiddleware, requireCapability('beneficiaries:manage'));

beneficiariesRoute.get('/', async (c) => {
  const beneficiaries = await c
    .get('services')
    .beneficiaries.listBeneficiaries(c.get('userId'));
  return c.json(success(beneficiaries));
});

beneficiariesRoute.post('/', zValidator('json', CreateBeneficiarySchema, throwOnInvalid), async (c) => {
  const beneficiary = await c
    .get('services')
    .beneficiaries.createBeneficiary(c.get('userId'), c.req.valid('json'));
  return c.json(success(beneficiary), 201);
});

beneficiariesRoute.get('/:id', zValidator('param', UuidParamSchema, throwOnInvalid), async (c) => {
  const beneficiary = await c
    .get('services')
    .beneficiaries.getBeneficiary(c.get('userId'), c.req.valid('param').id);
  return c.json(success(beneficiary));
});

beneficiariesRoute.put(
  '/:id',
  zValidator('param', UuidParamSchema, throwOnInvalid),
  zValidator('json', UpdateBeneficiarySchema, throwOnInvalid),
  async (c) => {
    const beneficiary = await c
      .get('services')
      .beneficiaries.updateBeneficiary(
        c.get('userId'),
        c.req.valid('param').id,
        c.req.valid('json')
      );
    return c.json(success(beneficiary));
  }
);

beneficiariesRoute.delete('/:id', zValidator('param', UuidParamSchema, throwOnInvalid), async (c) => {
  const { id } = c.req.valid('param');
  await c.get('services').beneficiaries.deleteBeneficiary(c.get('userId'), id);
  return c.json(success({ id, deleted: true }));
});

export { beneficiariesRoute };
