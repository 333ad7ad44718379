import { Router } from 'express';
import { authenticate, requireRole } from '../middlewares/auth';
import { AccountController } from '../controllers/AccountController';
import { BrandController } from '../controllers/BrandController';
import { CampaignController } from '../controllers/CampaignController';
import { InfluencerController } from '../controllers/InfluencerController';
import { JobController } from '../controllers/JobController';
import { PayoutController } from '../controllers/PayoutController';
import { PaymentMethodController } from '../controllers/PaymentMethodController';
import { PaymentController } from '../controllers/PaymentController';
import { CurrencyController } from '../controllers/CurrencyController';
import { OAuthController } from '../controllers/OAuthController';
import { AdminController } from '../controllers/AdminController';

const router = Router();

const brandOnly = [authenticate, requireRole('brand')];
const influencerOnly = [authenticate, requireRole('influencer')];
const adminOnly = [authenticate, requireRole('admin')];

// --- Accounts ---

/**
 * @swagger
 * /accounts/signup:
 *   post:
 *     summary: Create an account
 *     description: |
 *       Creates a brand or influencer account with its empty profile and
 *       e-mails a single-use verification link.
 *     tags: [Accounts]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, username, password, role]
 *             properties:
 *               email: { type: string, example: "studio@example.com" }
 *               username: { type: string, example: "studio" }
 *               password: { type: string, minLength: 8 }
 *               role: { type: string, enum: [brand, influencer] }
 *               company_name: { type: string, description: "Required for brands" }
 *               display_name: { type: string }
 *     responses:
 *       201: { description: Account created }
 *       409: { description: Email already registered }
 */
router.post('/accounts/signup', AccountController.signup);

/**
 * @swagger
 * /accounts/verify-email:
 *   get:
 *     summary: Confirm an email address
 *     tags: [Accounts]
 *     parameters:
 *       - in: query
 *         name: token
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       200: { description: Email verified }
 *       400: { description: Invalid, used or expired token }
 */
router.get('/accounts/verify-email', AccountController.verifyEmail);
router.post('/accounts/resend-verification', AccountController.resendVerification);

/**
 * @swagger
 * /accounts/login:
 *   post:
 *     summary: Sign in
 *     description: Returns a bearer session token.
 *     tags: [Accounts]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string }
 *               password: { type: string }
 *     responses:
 *       200: { description: Session issued }
 *       401: { description: Invalid credentials }
 *       403: { description: Email not verified }
 */
router.post('/accounts/login', AccountController.login);
router.get('/accounts/me', authenticate, AccountController.me);

// --- Brands ---

/**
 * @swagger
 * /brands/me:
 *   get:
 *     summary: Brand profile and verification state
 *     tags: [Brands]
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: Profile }
 *   put:
 *     summary: Update the brand profile
 *     description: Completing name and industry schedules an automated review 5-10 minutes out.
 *     tags: [Brands]
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       content:
 *         application/json:
 *           schema: { $ref: '#/components/schemas/BrandProfile' }
 *     responses:
 *       200: { description: Updated }
 */
router.get('/brands/me', ...brandOnly, BrandController.getProfile);
router.put('/brands/me', ...brandOnly, BrandController.updateProfile);

/**
 * @swagger
 * /brands/me/wallet:
 *   get:
 *     summary: Wallet balance and ledger
 *     tags: [Wallet]
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: Balance and recent transactions }
 */
router.get('/brands/me/wallet', ...brandOnly, BrandController.getWallet);

/**
 * @swagger
 * /brands/me/wallet/top-up:
 *   post:
 *     summary: Start a wallet top-up
 *     description: Returns the gateway checkout URL. The wallet is credited when the gateway confirms.
 *     tags: [Wallet]
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [amount]
 *             properties:
 *               amount: { type: number, example: 250 }
 *     responses:
 *       201: { description: Checkout created }
 *       502: { description: Gateway error }
 */
router.post('/brands/me/wallet/top-up', ...brandOnly, BrandController.topUp);

// --- Campaigns ---

/**
 * @swagger
 * /campaigns:
 *   get:
 *     summary: The brand's campaigns
 *     tags: [Campaigns]
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: Campaign list }
 *   post:
 *     summary: Create and pay for a campaign
 *     description: |
 *       Debits the full budget from the brand wallet and records a
 *       campaign payment in one transaction. Fails with
 *       INSUFFICIENT_BALANCE without side effects.
 *     tags: [Campaigns]
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema: { $ref: '#/components/schemas/CampaignCreate' }
 *     responses:
 *       201: { description: Draft campaign created }
 *       400: { description: Validation error or insufficient balance }
 *       403: { description: Brand paused }
 */
router.get('/campaigns', ...brandOnly, CampaignController.list);
router.post('/campaigns', ...brandOnly, CampaignController.create);
router.get('/campaigns/:id', ...brandOnly, CampaignController.get);
router.put('/campaigns/:id', ...brandOnly, CampaignController.update);

/**
 * @swagger
 * /campaigns/{id}/activate:
 *   post:
 *     summary: Activate a draft campaign
 *     description: Charges the wallet only if no campaign payment exists yet.
 *     tags: [Campaigns]
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     responses:
 *       200: { description: Campaign active }
 *       409: { description: Not a draft }
 */
router.post('/campaigns/:id/activate', ...brandOnly, CampaignController.activate);
router.post('/campaigns/:id/status', ...brandOnly, CampaignController.setStatus);

// --- Influencers ---

router.get('/influencers/me', ...influencerOnly, InfluencerController.getProfile);
router.put('/influencers/me', ...influencerOnly, InfluencerController.updateProfile);

/**
 * @swagger
 * /influencers/me/complete-onboarding:
 *   post:
 *     summary: Finish onboarding
 *     description: Requires at least one connected platform, a niche and a primary platform. Schedules the automated review.
 *     tags: [Influencers]
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: Onboarding complete }
 *       400: { description: Missing platform or profile fields }
 */
router.post('/influencers/me/complete-onboarding', ...influencerOnly, InfluencerController.completeOnboarding);

/**
 * @swagger
 * /influencers/me/connections:
 *   get:
 *     summary: Connected platform accounts
 *     tags: [Influencers]
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: Connections }
 *   post:
 *     summary: Declare a platform account
 *     tags: [Influencers]
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema: { $ref: '#/components/schemas/ConnectionCreate' }
 *     responses:
 *       201: { description: Connection pending verification }
 *       409: { description: Platform already connected }
 */
router.get('/influencers/me/connections', ...influencerOnly, InfluencerController.listConnections);
router.post('/influencers/me/connections', ...influencerOnly, InfluencerController.addConnection);
router.put('/influencers/me/connections/:id', ...influencerOnly, InfluencerController.updateConnection);
router.delete('/influencers/me/connections/:id', ...influencerOnly, InfluencerController.removeConnection);

/**
 * @swagger
 * /influencers/me/connections/{id}/verify:
 *   post:
 *     summary: Verify a connection now
 *     description: Cross-checks the follower count against the platform and scores the connection.
 *     tags: [Verification]
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     responses:
 *       200: { description: Verification result with confidence and flags }
 */
router.post('/influencers/me/connections/:id/verify', ...influencerOnly, InfluencerController.verifyConnection);

router.get('/oauth/:platform/start', ...influencerOnly, OAuthController.start);

/**
 * @swagger
 * /oauth/{platform}/callback:
 *   get:
 *     summary: OAuth redirect target
 *     description: The signed `state` identifies the influencer; a missing, expired or altered state is refused.
 *     tags: [OAuth]
 *     parameters:
 *       - in: path
 *         name: platform
 *         required: true
 *         schema: { type: string, enum: [tiktok, facebook, instagram] }
 *       - in: query
 *         name: code
 *         schema: { type: string }
 *       - in: query
 *         name: state
 *         schema: { type: string }
 *     responses:
 *       200: { description: Connected and verified }
 *       400: { description: Invalid state or authorization denied }
 */
router.get('/oauth/:platform/callback', OAuthController.callback);

// --- Jobs ---

router.get('/jobs', ...influencerOnly, JobController.listOpen);

/**
 * @swagger
 * /jobs/{campaignId}/accept:
 *   post:
 *     summary: Accept a job
 *     description: |
 *       Needs an approved influencer with a verified connection on the
 *       campaign platform meeting the platform minimum. Creates the
 *       submission and a pending payout in the influencer's currency.
 *     tags: [Jobs]
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: campaignId
 *         required: true
 *         schema: { type: string, format: uuid }
 *     responses:
 *       201: { description: Submission and payout created }
 *       403: { description: Not eligible }
 *       409: { description: Already accepted }
 */
router.post('/jobs/:campaignId/accept', ...influencerOnly, JobController.accept);
router.get('/submissions', ...influencerOnly, JobController.mySubmissions);
router.post('/submissions/:id/proof', ...influencerOnly, JobController.submitProof);

// --- Influencer wallet ---

/**
 * @swagger
 * /influencers/me/wallet:
 *   get:
 *     summary: Earnings summary
 *     description: Available, pending clearance, total earned and overdue amounts, in the settlement currency.
 *     tags: [Payouts]
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: Summary and payouts }
 */
router.get('/influencers/me/wallet', ...influencerOnly, PayoutController.wallet);
router.post('/influencers/me/withdrawals', ...influencerOnly, PayoutController.requestWithdrawal);

router.get('/influencers/me/payment-methods', ...influencerOnly, PaymentMethodController.list);
router.post('/influencers/me/payment-methods', ...influencerOnly, PaymentMethodController.add);
router.put('/influencers/me/payment-methods/:id', ...influencerOnly, PaymentMethodController.update);
router.delete('/influencers/me/payment-methods/:id', ...influencerOnly, PaymentMethodController.remove);
router.post('/influencers/me/payment-methods/:id/default', ...influencerOnly, PaymentMethodController.setDefault);

// --- Payments ---

/**
 * @swagger
 * /payments/webhook:
 *   post:
 *     summary: Payment gateway webhook
 *     description: |
 *       Signed with HMAC-SHA512 of the raw body in `x-paystack-signature`.
 *       `charge.success` credits the wallet once; replays are ignored.
 *     tags: [Payments]
 *     responses:
 *       200: { description: Processed or ignored }
 *       400: { description: Invalid signature }
 */
router.post('/payments/webhook', PaymentController.webhook);
router.get('/payments/callback', ...brandOnly, PaymentController.verify);

// --- Currencies ---

router.get('/currencies', CurrencyController.list);
router.get('/currencies/convert', CurrencyController.convert);

// --- Admin ---

router.get('/admin/brands', ...adminOnly, AdminController.listBrands);
router.post('/admin/brands/:id/review', ...adminOnly, AdminController.reviewBrand);
router.get('/admin/influencers', ...adminOnly, AdminController.listInfluencers);
router.post('/admin/influencers/:id/review', ...adminOnly, AdminController.reviewInfluencer);
router.post('/admin/submissions/:id/review', ...adminOnly, JobController.review);

router.get('/admin/platform-settings', ...adminOnly, AdminController.listPlatformSettings);
router.put('/admin/platform-settings/:platform', ...adminOnly, AdminController.updatePlatformSetting);

/**
 * @swagger
 * /admin/verification-queue/drain:
 *   post:
 *     summary: Process due verification jobs
 *     tags: [Verification]
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             properties:
 *               kind: { type: string, enum: [brand, influencer] }
 *               limit: { type: integer, example: 50 }
 *               auto_approve: { type: boolean }
 *     responses:
 *       200: { description: Drain statistics }
 */
router.post('/admin/verification-queue/drain', ...adminOnly, AdminController.drainQueue);
router.get('/admin/verification-queue', ...adminOnly, AdminController.queueStatus);
router.post('/admin/connections/verify-pending', ...adminOnly, AdminController.batchVerifyConnections);
router.get('/admin/connections/suspicious', ...adminOnly, AdminController.suspiciousConnections);

router.get('/admin/payouts/overdue', ...adminOnly, PayoutController.overdue);
router.post('/admin/payouts/:id/sent', ...adminOnly, PayoutController.markSent);
router.post('/admin/payouts/:id/failed', ...adminOnly, PayoutController.markFailed);

router.post('/admin/currencies', ...adminOnly, CurrencyController.create);
router.put('/admin/currencies/:id/rate', ...adminOnly, CurrencyController.updateRate);
router.post('/admin/currencies/:id/default', ...adminOnly, CurrencyController.setDefault);

export default router;
