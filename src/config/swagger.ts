import swaggerJsdoc from 'swagger-jsdoc';
import { settings } from './settings';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Creator Marketplace API',
      version: '1.0.0',
      description: 'Brand and influencer verification, campaigns, jobs, wallets and payouts.',
    },
    servers: [
      {
        url: `${settings.publicUrl}/api/v1`,
        description: 'Configured public URL',
      },
    ],
    components: {
      securitySchemes: {
        bearerAuth: { type: 'http', scheme: 'bearer' },
      },
      schemas: {
        BrandProfile: {
          type: 'object',
          properties: {
            company_name: { type: 'string' },
            industry: { type: 'string', example: 'Fashion' },
            description: { type: 'string' },
            website: { type: 'string', example: 'https://example.com' },
            contact_email: { type: 'string' },
            contact_phone: { type: 'string', example: '+233201234567' },
            currency: { type: 'string', example: 'GHS' },
          },
        },
        CampaignCreate: {
          type: 'object',
          required: ['title', 'platform', 'budget', 'package_videos'],
          properties: {
            title: { type: 'string' },
            description: { type: 'string' },
            platform: { type: 'string', enum: ['tiktok', 'instagram', 'youtube'] },
            niche: { type: 'string' },
            budget: { type: 'number', example: 500 },
            package_videos: { type: 'integer', example: 5 },
            start_date: { type: 'string', format: 'date' },
            due_date: { type: 'string', format: 'date' },
          },
        },
        ConnectionCreate: {
          type: 'object',
          required: ['platform', 'handle', 'followers_count'],
          properties: {
            platform: { type: 'string', enum: ['tiktok', 'instagram', 'youtube', 'facebook'] },
            handle: { type: 'string', example: 'creator.name' },
            followers_count: { type: 'integer', example: 12000 },
            engagement_rate: { type: 'number', example: 3.2 },
            sample_post_url: { type: 'string' },
          },
        },
      },
    },
  },
  apis: ['./src/routes/*.ts'],
};

export const swaggerSpec = swaggerJsdoc(options);
