import bcrypt from "bcryptjs";
import connectDB from "../config/database";
import { loadConfig, loadEnvFile } from "../config/env";
import { createModels } from "../models";
import { createMongoStore } from "../repositories/mongo/store";
import { NewProduct } from "../repositories/types";

// Resets the database to a small demo catalog with one admin and one
// customer whose cart already holds a few products.

loadEnvFile();

const catalog: { title: string; description: string; products: Omit<NewProduct, "categoryId">[] }[] = [
  {
    title: "Fruits & Vegetables",
    description: "Fresh produce",
    products: [
      { sku: "FRT-APL-1KG", name: "Apples (1 kg)", description: null, imageUrl: null, price: 180, stock: 40 },
      { sku: "FRT-BAN-12", name: "Bananas (12 pcs)", description: null, imageUrl: null, price: 60, stock: 80 },
      { sku: "VEG-TOM-500G", name: "Tomatoes (500 g)", description: null, imageUrl: null, price: 35.5, stock: 25 },
    ],
  },
  {
    title: "Dairy",
    description: "Milk, cheese and eggs",
    products: [
      { sku: "DRY-MLK-1L", name: "Whole Milk (1 L)", description: null, imageUrl: null, price: 68, stock: 30 },
      { sku: "DRY-EGG-6", name: "Eggs (6 pcs)", description: null, imageUrl: null, price: 54.25, stock: 3 },
    ],
  },
  {
    title: "Pantry",
    description: "Staples",
    products: [
      { sku: "PNT-RCE-5KG", name: "Basmati Rice (5 kg)", description: null, imageUrl: null, price: 649.99, stock: 12 },
      { sku: "PNT-OIL-1L", name: "Sunflower Oil (1 L)", description: null, imageUrl: null, price: 155, stock: 0 },
    ],
  },
];

const seedDatabase = async (): Promise<void> => {
  const config = loadConfig();
  const connection = await connectDB(config);

  try {
    const models = createModels(connection);
    const { repositories } = createMongoStore(connection, {
      retryWindowMs: config.transactionRetryWindowMs,
    });

    console.log("🗑️  Clearing existing data...");
    await Promise.all([
      models.Order.deleteMany({}),
      models.Cart.deleteMany({}),
      models.Product.deleteMany({}),
      models.Category.deleteMany({}),
      models.User.deleteMany({}),
    ]);
    console.log("✅ Cleared existing data");

    const admin = await repositories.users.create({
      email: "admin@example.com",
      passwordHash: await bcrypt.hash("admin123", 10),
      name: "Store Admin",
      phone: null,
      role: "admin",
    });
    console.log(`✅ Created admin: ${admin.email} / admin123`);

    const customer = await repositories.users.create({
      email: "demo@example.com",
      passwordHash: await bcrypt.hash("demo123", 10),
      name: "Demo User",
      phone: "9876543210",
      role: "customer",
    });
    const cart = await repositories.carts.create(customer.id);
    console.log(`✅ Created demo user: ${customer.email} / demo123`);

    const productIds: string[] = [];
    for (const entry of catalog) {
      const category = await repositories.categories.create({
        title: entry.title,
        description: entry.description,
      });
      for (const product of entry.products) {
        const created = await repositories.products.create({ ...product, categoryId: category.id });
        productIds.push(created.id);
      }
      console.log(`✅ Created category ${category.title} with ${entry.products.length} products`);
    }

    for (const productId of productIds.slice(0, 3)) {
      await repositories.carts.upsertItem(cart.id, productId, 2);
    }
    console.log("✅ Filled demo cart");

    console.log("🎉 Seed completed");
  } finally {
    await connection.close();
  }
};

seedDatabase().catch((error) => {
  console.error("❌ Seed failed:", error);
  process.exit(1);
});
