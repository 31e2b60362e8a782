import { Body, Controller, HttpCode, Post, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { parseRequest } from '../../common/validation/parse-request.js';
import type { PaymentRow } from '../../database/schema/index.js';
import { assertAdmin } from '../auth/access-policy.js';
import { CurrentUser } from '../auth/decorators/current-user.decorator.js';
import { JwtAuthGuard } from '../auth/jwt-auth.guard.js';
import type { Principal } from '../auth/principal.js';
import { OpenPaymentSchema } from './dto/open-payment.dto.js';
import { ProviderOutcomeSchema } from './dto/provider-outcome.dto.js';
import { isPaid } from './payment-status.js';
import { PaymentService } from './payment.service.js';

function toPaymentResponse(payment: PaymentRow) {
  return {
    id: payment.id,
    user_id: payment.userId,
    amount_cents: payment.amountCents,
    currency: payment.currency,
    provider_reference: payment.providerReference,
    status: payment.status,
    is_paid: isPaid(payment),
    description: payment.description,
  };
}

@ApiTags('Payments')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard)
@Controller('payments')
export class PaymentController {
  constructor(private readonly paymentService: PaymentService) {}

  @Post()
  @ApiOperation({ summary: 'Record a checkout started with the payment provider' })
  async open(@CurrentUser() principal: Principal, @Body() body: unknown) {
    const params = parseRequest(OpenPaymentSchema, body);
    const payment = await this.paymentService.openPayment(principal, {
      patientId: params.patient_id,
      amountCents: params.amount_cents,
      currency: params.currency,
      description: params.description,
      providerReference: params.provider_reference,
    });
    return toPaymentResponse(payment);
  }

  @Post('provider-outcome')
  @HttpCode(200)
  @ApiOperation({ summary: 'Apply the payment provider outcome for a reference' })
  async providerOutcome(
    @CurrentUser() principal: Principal,
    @Body() body: unknown,
  ) {
    assertAdmin(principal);
    const params = parseRequest(ProviderOutcomeSchema, body);
    const payment = await this.paymentService.recordProviderOutcome(
      params.reference,
      params.ok
        ? { ok: true, status: params.status }
        : { ok: false, error: params.error },
    );
    return toPaymentResponse(payment);
  }
}
